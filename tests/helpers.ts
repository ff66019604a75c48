import { OrderGateway } from '../src/clobClient.js';
import { openDatabase } from '../src/database.js';
import { LedgerStore } from '../src/ledgerStore.js';
import { NotificationEvent, NotificationSink, NotificationType } from '../src/notifications.js';
import { MarketDataSource } from '../src/polymarketApi.js';
import { FokOrderRequest, OrderSubmissionResult, TradeEvent, TradeSide, Wallet } from '../src/types.js';

export const WALLET_A = '0x' + 'a1'.repeat(20);
export const WALLET_B = '0x' + 'b2'.repeat(20);

/**
 * Fresh in-memory ledger with a fixed clock
 */
export function createTestStore(now: () => Date = () => new Date('2026-01-01T00:00:00.000Z')): LedgerStore {
  return new LedgerStore(openDatabase(':memory:'), now);
}

let walletCounter = 0;

export function addWallet(store: LedgerStore, userId: string, code?: string): Wallet {
  walletCounter++;
  const fixedCode = code ?? `T${String(walletCounter).padStart(6, '0')}`;
  return store.createWallet(
    {
      userId,
      handle: `@${userId}`,
      address: '0x' + String(walletCounter).padStart(40, '0'),
      credentialRef: 'env:TEST_KEY',
    },
    () => fixedCode
  );
}

export function makeTrade(overrides: Partial<TradeEvent> = {}): TradeEvent {
  const size = overrides.size ?? 100;
  const price = overrides.price ?? 0.5;
  return {
    sourceWallet: WALLET_A,
    marketId: 'cond-1',
    tokenId: 'token-1',
    marketTitle: 'Will it rain tomorrow?',
    outcome: 'Yes',
    side: 'BUY',
    transactionHash: '0xaa',
    timestamp: 100,
    ...overrides,
    size,
    price,
    volume: overrides.volume ?? size * price,
  };
}

/**
 * Raw data-API record, as /trades returns it
 */
export function rawTrade(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    proxyWallet: WALLET_A,
    side: 'BUY',
    asset: 'token-1',
    conditionId: 'cond-1',
    size: 100,
    price: 0.5,
    timestamp: 100,
    title: 'Will it rain tomorrow?',
    outcome: 'Yes',
    transactionHash: '0xAA',
    ...overrides,
  };
}

export class FakeMarketData implements MarketDataSource {
  trades = new Map<string, unknown[]>();
  failingWallets = new Set<string>();
  prices = new Map<string, number | null>();
  tradeCalls: string[] = [];
  priceCalls: Array<{ tokenId: string; side: TradeSide }> = [];

  async getWalletTrades(wallet: string, limit: number): Promise<unknown[]> {
    this.tradeCalls.push(wallet);
    if (this.failingWallets.has(wallet)) {
      throw new Error(`feed unavailable for ${wallet}`);
    }
    return (this.trades.get(wallet) ?? []).slice(0, limit);
  }

  async getBestPrice(tokenId: string, side: TradeSide): Promise<number | null> {
    this.priceCalls.push({ tokenId, side });
    const price = this.prices.get(`${tokenId}:${side}`);
    return price === undefined ? null : price;
  }
}

export class FakeOrderGateway implements OrderGateway {
  submissions: Array<{ userId: string; order: FokOrderRequest }> = [];
  nextResults: OrderSubmissionResult[] = [];
  defaultResult: OrderSubmissionResult = { outcome: 'filled', orderId: 'order-1' };
  delayMs = 0;

  async submitFok(userId: string, order: FokOrderRequest): Promise<OrderSubmissionResult> {
    this.submissions.push({ userId, order });
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    return this.nextResults.shift() ?? this.defaultResult;
  }
}

export class RecordingNotificationSink implements NotificationSink {
  events: NotificationEvent[] = [];

  notify(notification: NotificationEvent): void {
    this.events.push(notification);
  }

  ofType(type: NotificationType): NotificationEvent[] {
    return this.events.filter(event => event.type === type);
  }
}
