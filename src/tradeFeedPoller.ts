import { MarketDataSource, normalizeTrade } from './polymarketApi.js';
import { TradeEvent } from './types.js';
import { getErrorMessage } from './utils/errors.js';

export interface TradeCursor {
  /** Unix seconds; older trades are not returned */
  since: number;
}

export interface WalletPollResult {
  wallet: string;
  candidates: TradeEvent[];
}

export interface PollResult {
  /** Candidates per wallet that answered, in the order wallets were given */
  batches: WalletPollResult[];
  failedWallets: string[];
}

/**
 * Fetches recent trades for every tracked source wallet.
 *
 * Requests for different wallets run concurrently and are joined before
 * returning. A failing wallet is logged and reported; the others still return.
 * Deciding what is new is left to the TradeEventFilter.
 */
export class TradeFeedPoller {
  constructor(
    private readonly api: MarketDataSource,
    private readonly fetchLimit: number
  ) {}

  async poll(sourceWallets: Iterable<string>, cursor: TradeCursor): Promise<PollResult> {
    const wallets = [...new Set([...sourceWallets].map(wallet => wallet.toLowerCase()))];

    const settled = await Promise.allSettled(
      wallets.map(wallet => this.fetchWallet(wallet, cursor))
    );

    const result: PollResult = { batches: [], failedWallets: [] };
    settled.forEach((outcome, index) => {
      const wallet = wallets[index];
      if (outcome.status === 'fulfilled') {
        result.batches.push({ wallet, candidates: outcome.value });
      } else {
        result.failedWallets.push(wallet);
        console.warn(`[Poller] Failed to fetch trades for ${wallet.substring(0, 10)}..., will retry next tick: ${getErrorMessage(outcome.reason)}`);
      }
    });

    return result;
  }

  private async fetchWallet(wallet: string, cursor: TradeCursor): Promise<TradeEvent[]> {
    const rawTrades = await this.api.getWalletTrades(wallet, this.fetchLimit);
    const candidates: TradeEvent[] = [];
    let malformed = 0;

    for (const raw of rawTrades) {
      const trade = normalizeTrade(raw, wallet);
      if (!trade) {
        malformed++;
        continue;
      }
      if (trade.timestamp >= cursor.since) {
        candidates.push(trade);
      }
    }

    if (malformed > 0) {
      console.warn(`[Poller] Skipped ${malformed} malformed trade record(s) for ${wallet.substring(0, 10)}...`);
    }
    return candidates;
  }
}
