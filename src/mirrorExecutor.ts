import { OrderGateway } from './clobClient.js';
import { config } from './config.js';
import { LedgerStore } from './ledgerStore.js';
import { NotificationSink } from './notifications.js';
import { MarketDataSource } from './polymarketApi.js';
import {
  CopySubscription,
  FinalMirrorOutcome,
  MirrorOrder,
  OrderSubmissionResult,
  TradeEvent,
  tradeEventKey,
} from './types.js';
import { TimeoutError, getErrorMessage } from './utils/errors.js';
import { withTimeout } from './utils/timeout.js';

export interface MirrorExecutorOptions {
  minOrderUsd: number;
  quoteTimeoutMs: number;
  orderTimeoutMs: number;
}

/**
 * Scale a share size and floor it to the CLOB's two-decimal size precision
 */
export function scaleOrderSize(size: number, scaleFactor: number): number {
  // The epsilon absorbs float error such as 0.29 * 100 = 28.999999999999996
  return Math.floor(size * scaleFactor * 100 + 1e-9) / 100;
}

interface Finalization {
  outcome: FinalMirrorOutcome;
  orderId?: string;
  detail?: string;
  price?: number | null;
}

/**
 * Replicates observed trades on subscribers' accounts with fill-or-kill orders.
 *
 * Each (user, event) pair is journaled as pending before anything is sent, so
 * an event is submitted at most once even across overlapping calls. Killed and
 * failed orders are final; nothing is retried.
 */
export class MirrorExecutionEngine {
  private options: MirrorExecutorOptions;

  constructor(
    private readonly store: LedgerStore,
    private readonly marketData: MarketDataSource,
    private readonly gateway: OrderGateway,
    private readonly notifier: NotificationSink,
    options: Partial<MirrorExecutorOptions> = {}
  ) {
    this.options = {
      minOrderUsd: options.minOrderUsd ?? config.minOrderUsd,
      quoteTimeoutMs: options.quoteTimeoutMs ?? config.httpTimeoutMs,
      orderTimeoutMs: options.orderTimeoutMs ?? config.orderTimeoutMs,
    };
  }

  /**
   * Mirror one event for one subscription.
   * Returns the finalized order, or null when this event was already mirrored for the user.
   */
  async mirror(event: TradeEvent, subscription: CopySubscription): Promise<MirrorOrder | null> {
    const eventKey = tradeEventKey(event);
    const userId = subscription.userId;
    const requestedSize = scaleOrderSize(event.size, subscription.scaleFactor);

    const pending = this.store.beginMirrorOrder({
      eventKey,
      userId,
      marketId: event.marketId,
      tokenId: event.tokenId,
      side: event.side,
      requestedSize,
      price: null,
    });
    if (!pending) {
      console.log(`[Mirror] ${eventKey} already mirrored for ${userId}, skipping`);
      return null;
    }

    let finalization: Finalization;
    try {
      finalization = await this.execute(event, requestedSize, userId);
    } catch (error: unknown) {
      finalization = { outcome: 'error', detail: getErrorMessage(error) };
    }

    const order = this.store.finalizeMirrorOrder(pending.id, finalization.outcome, {
      orderId: finalization.orderId,
      detail: finalization.detail,
      price: finalization.price,
    });

    if (order.outcome === 'error') {
      console.error(`[Mirror] ${userId} ${event.side} ${requestedSize} on ${event.marketId.substring(0, 12)}... failed: ${order.detail ?? 'unknown error'}`);
      this.notifier.notify({
        type: 'error',
        userId,
        context: `mirror ${eventKey}`,
        message: order.detail ?? 'Order submission failed',
      });
    } else {
      console.log(`[Mirror] ${userId} ${event.side} ${requestedSize} @ ${order.price ?? 'n/a'} -> ${order.outcome}`);
      this.notifier.notify({ type: 'trade_mirrored', userId, event, order });
    }
    return order;
  }

  private async execute(event: TradeEvent, requestedSize: number, userId: string): Promise<Finalization> {
    if (requestedSize <= 0) {
      return { outcome: 'skipped', detail: 'Scaled size rounds to zero' };
    }

    let price: number | null;
    try {
      price = await withTimeout(
        this.marketData.getBestPrice(event.tokenId, event.side),
        this.options.quoteTimeoutMs,
        'Quote'
      );
    } catch (error: unknown) {
      return { outcome: 'error', detail: `Quote failed: ${getErrorMessage(error)}` };
    }

    if (price === null) {
      const bookSide = event.side === 'BUY' ? 'ask' : 'bid';
      return { outcome: 'skipped', detail: `No ${bookSide} liquidity to quote against` };
    }

    const notional = requestedSize * price;
    if (notional < this.options.minOrderUsd) {
      return {
        outcome: 'skipped',
        price,
        detail: `Notional $${notional.toFixed(2)} is below the $${this.options.minOrderUsd} minimum`,
      };
    }

    let result: OrderSubmissionResult;
    try {
      result = await withTimeout(
        this.gateway.submitFok(userId, { tokenId: event.tokenId, side: event.side, size: requestedSize, price }),
        this.options.orderTimeoutMs,
        'Order submission'
      );
    } catch (error: unknown) {
      const detail = error instanceof TimeoutError
        ? `${error.message}, order state unknown`
        : getErrorMessage(error);
      return { outcome: 'error', price, detail };
    }

    return {
      outcome: result.outcome,
      orderId: result.orderId,
      detail: result.detail,
      price: result.price ?? price,
    };
  }
}
