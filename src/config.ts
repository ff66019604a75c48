import dotenv from 'dotenv';

dotenv.config();

// Helper function to ensure URLs have a protocol prefix
function ensureProtocol(url: string, defaultUrl: string): string {
  if (!url) return defaultUrl;
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    console.warn(`[CONFIG] URL "${url}" is missing protocol, auto-prepending https://`);
    return `https://${url}`;
  }
  return url;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    console.warn(`[CONFIG] Ignoring non-numeric value "${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export const config = {
  // Signing key of the operator's trading account. Only the signer provider reads it.
  privateKey: process.env.PRIVATE_KEY || '',

  // User id (wallets.user_id) that owns the trading account above
  operatorUserId: process.env.OPERATOR_USER_ID || 'operator',

  // Polymarket endpoints
  polymarketClobApiUrl: ensureProtocol(process.env.POLYMARKET_CLOB_API_URL || '', 'https://clob.polymarket.com'),
  polymarketDataApiUrl: ensureProtocol(process.env.POLYMARKET_DATA_API_URL || '', 'https://data-api.polymarket.com'),

  // 0 = EOA, 1 = POLY_PROXY, 2 = POLY_GNOSIS_SAFE
  polymarketSignatureType: parseNumber(process.env.POLYMARKET_SIGNATURE_TYPE, 0),
  polymarketFunderAddress: process.env.POLYMARKET_FUNDER_ADDRESS || '',

  // Server configuration
  port: parseNumber(process.env.PORT, 3001),

  // Data directory (holds ledger.db)
  dataDir: process.env.DATA_DIR || './data',

  // Polling
  monitoringIntervalMs: parseNumber(process.env.MONITORING_INTERVAL_MS, 5000),
  dedupHorizonMs: parseNumber(process.env.DEDUP_HORIZON_MS, 30 * 60 * 1000),
  tradesFetchLimit: parseNumber(process.env.TRADES_FETCH_LIMIT, 50),

  // Timeouts for outbound calls
  httpTimeoutMs: parseNumber(process.env.HTTP_TIMEOUT_MS, 15000),
  orderTimeoutMs: parseNumber(process.env.ORDER_TIMEOUT_MS, 20000),

  // Mirrors below this notional (USDC) are skipped
  minOrderUsd: parseNumber(process.env.MIN_ORDER_USD, 1),

  validate(): void {
    if (!this.privateKey) {
      console.error('\n❌ ERROR: Trading wallet not configured!\n');
      console.error('Set PRIVATE_KEY in your .env file to enable order submission.\n');
      throw new Error('PRIVATE_KEY is required to mirror trades.');
    }

    if (this.dedupHorizonMs < this.monitoringIntervalMs) {
      throw new Error(
        `DEDUP_HORIZON_MS (${this.dedupHorizonMs}) must be at least MONITORING_INTERVAL_MS (${this.monitoringIntervalMs})`
      );
    }

    if (this.polymarketSignatureType !== 0 && !this.polymarketFunderAddress) {
      console.warn('⚠️  POLYMARKET_SIGNATURE_TYPE is a proxy type but POLYMARKET_FUNDER_ADDRESS is not set.');
      console.warn('   Orders will be signed with the EOA as funder.');
    }
  }
};

export type AppConfig = typeof config;
