import { TradeEvent, tradeEventKey } from './types.js';
import { ExpiringKeySet } from './utils/expiringKeySet.js';
import { getErrorMessage } from './utils/errors.js';

export type TradeEventListener = (event: TradeEvent) => void;

/**
 * Total order on trade events: timestamp, then transaction hash, then wallet
 */
export function compareTradeEvents(a: TradeEvent, b: TradeEvent): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.transactionHash !== b.transactionHash) return a.transactionHash < b.transactionHash ? -1 : 1;
  if (a.sourceWallet !== b.sourceWallet) return a.sourceWallet < b.sourceWallet ? -1 : 1;
  return 0;
}

/**
 * Turns raw poll candidates into an ordered, exactly-once event stream.
 *
 * The seen-set forgets keys whose trade time falls behind the horizon;
 * candidates that old are dropped too, so a forgotten key is never re-emitted.
 * Not safe for concurrent ingest calls; the session serializes ticks.
 */
export class TradeEventFilter {
  private seen: ExpiringKeySet;
  private listeners: TradeEventListener[] = [];

  constructor(horizonMs: number, private readonly clock: () => number = Date.now) {
    this.seen = new ExpiringKeySet(horizonMs);
  }

  subscribe(listener: TradeEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(existing => existing !== listener);
    };
  }

  get seenCount(): number {
    return this.seen.size;
  }

  hasSeen(event: TradeEvent): boolean {
    return this.seen.has(tradeEventKey(event));
  }

  /**
   * Merge, order, drop already-seen and stale candidates, then emit the rest.
   * Returns the emitted events in emission order.
   */
  ingest(batches: TradeEvent[][]): TradeEvent[] {
    const fresh = this.selectFresh(batches);
    for (const event of fresh) {
      this.emit(event);
    }
    if (fresh.length > 0) {
      console.log(`[Filter] Emitted ${fresh.length} new trade event(s), ${this.seen.size} key(s) in window`);
    }
    return fresh;
  }

  /**
   * Mark candidates as seen without emitting them
   */
  prime(batches: TradeEvent[][]): number {
    return this.selectFresh(batches).length;
  }

  private selectFresh(batches: TradeEvent[][]): TradeEvent[] {
    const nowMs = this.clock();
    this.seen.prune(nowMs);

    const merged = batches.flat().sort(compareTradeEvents);
    const fresh: TradeEvent[] = [];
    for (const event of merged) {
      const atMs = event.timestamp * 1000;
      if (this.seen.isExpired(atMs, nowMs)) continue;
      if (!this.seen.add(tradeEventKey(event), atMs)) continue;
      fresh.push(event);
    }
    return fresh;
  }

  private emit(event: TradeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error: unknown) {
        console.error(`[Filter] Listener failed for ${tradeEventKey(event)}: ${getErrorMessage(error)}`);
      }
    }
  }
}
