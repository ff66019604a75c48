import { config } from './config.js';
import { EnvSignerProvider, PolymarketClobClient } from './clobClient.js';
import { PollerSession } from './copyTrader.js';
import { closeDatabase, getDatabase } from './database.js';
import { LedgerStore } from './ledgerStore.js';
import { MirrorExecutionEngine } from './mirrorExecutor.js';
import { ConsoleNotificationSink } from './notifications.js';
import { PointsAccrualEngine } from './pointsEngine.js';
import { PolymarketApi } from './polymarketApi.js';
import { createServer, startServer } from './server.js';
import { getErrorMessage } from './utils/errors.js';

const OPERATOR_CREDENTIAL_REF = 'env:PRIVATE_KEY';

/**
 * Make sure the operator's own wallet exists, signing through PRIVATE_KEY
 */
function ensureOperatorWallet(store: LedgerStore, points: PointsAccrualEngine, signerAddress: string): void {
  if (store.getWallet(config.operatorUserId)) {
    return;
  }
  const { wallet } = points.onboardUser({
    userId: config.operatorUserId,
    handle: 'operator',
    address: config.polymarketFunderAddress || signerAddress,
    credentialRef: OPERATOR_CREDENTIAL_REF,
  });
  console.log(`[Ledger] Created operator wallet ${wallet.userId} (referral code ${wallet.referralCode})`);
}

/**
 * Main entry point for the wallet mirror bot
 */
async function main(): Promise<void> {
  const store = new LedgerStore(getDatabase());
  const notifier = new ConsoleNotificationSink();
  const points = new PointsAccrualEngine(store, notifier);
  const marketData = new PolymarketApi();
  const signers = new EnvSignerProvider();
  const gateway = new PolymarketClobClient(userId => store.requireWallet(userId), signers);
  const mirror = new MirrorExecutionEngine(store, marketData, gateway, notifier);
  const session = new PollerSession({ store, marketData, points, mirror, notifier });

  // Web server first, so the API is reachable even if the bot cannot start
  console.log('🌐 Starting web server...');
  const app = createServer({ store, points, session });
  const server = await startServer(app);

  const shutdown = async (signal: string) => {
    console.log(`\n🛑 ${signal} received, shutting down...`);
    try {
      await session.stop();
    } catch (error: unknown) {
      console.error('Error while stopping session:', getErrorMessage(error));
    }
    server.close();
    closeDatabase();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  console.log('🔧 Validating configuration...');
  try {
    config.validate();
  } catch (error: unknown) {
    console.error('⚠️  Configuration validation failed:', getErrorMessage(error));
    console.error('⚠️  Mirroring will not start, but the web server is running.');
    return;
  }

  const operator = await signers.getSigner({ userId: config.operatorUserId, credentialRef: OPERATOR_CREDENTIAL_REF });
  ensureOperatorWallet(store, points, operator.address);

  const trackedWallets = store.getTrackedWallets();
  console.log(`\n${'='.repeat(60)}`);
  console.log('📊 BOT STATUS');
  console.log(`${'='.repeat(60)}`);
  if (trackedWallets.length === 0) {
    console.log('\n⚠️  No source wallets are being tracked yet.');
    console.log(`   POST /api/users/${config.operatorUserId}/subscriptions with a targetWallet to start mirroring.\n`);
  } else {
    console.log(`\n📋 Tracked wallets: ${trackedWallets.length}`);
    for (const wallet of trackedWallets) {
      console.log(`   • ${wallet.substring(0, 10)}...${wallet.substring(wallet.length - 8)}`);
    }
    console.log(`${'='.repeat(60)}\n`);
  }

  session.start();
}

main().catch((error: unknown) => {
  console.error('❌ Fatal error:', getErrorMessage(error));
  process.exit(1);
});
