import { config } from './config.js';
import { LedgerStore } from './ledgerStore.js';
import { MirrorExecutionEngine } from './mirrorExecutor.js';
import { NotificationSink } from './notifications.js';
import { PointsAccrualEngine } from './pointsEngine.js';
import { MarketDataSource } from './polymarketApi.js';
import { TradeFeedPoller } from './tradeFeedPoller.js';
import { TradeEventFilter } from './tradeFilter.js';
import { TradeEvent, tradeEventKey } from './types.js';
import { getErrorMessage } from './utils/errors.js';
import { KeyedSerialQueue } from './utils/keyedQueue.js';

export interface PollerSessionDeps {
  store: LedgerStore;
  marketData: MarketDataSource;
  points: PointsAccrualEngine;
  mirror: MirrorExecutionEngine;
  notifier: NotificationSink;
}

export interface PollerSessionOptions {
  intervalMs: number;
  horizonMs: number;
  fetchLimit: number;
  // Mark trades already in the window as seen on a wallet's first fetch instead of mirroring them
  skipBacklog: boolean;
  clock: () => number;
}

export interface TickSummary {
  trackedWallets: number;
  candidates: number;
  primed: number;
  emitted: number;
  failedWallets: string[];
}

export interface SessionStatus {
  running: boolean;
  tickInFlight: boolean;
  ticks: number;
  lastTickAt: Date | null;
  lastTick: TickSummary | null;
  lastError: string | null;
  seenKeys: number;
  primedWallets: number;
  pendingMirrorUsers: number;
}

/**
 * One polling session: owns the timer, the dedup filter, the primed-wallet set
 * and the per-user mirror queues.
 *
 * Ticks never overlap. Within a tick, points are granted synchronously while
 * the filter emits; mirror orders go onto a serial queue per user so a slow
 * order never holds up emission or other users.
 */
export class PollerSession {
  private readonly options: PollerSessionOptions;
  private readonly poller: TradeFeedPoller;
  private readonly filter: TradeEventFilter;
  private readonly mirrorQueue = new KeyedSerialQueue('Mirror');
  private readonly primedWallets = new Set<string>();

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickSummary> | null = null;
  private isRunning = false;
  private ticks = 0;
  private lastTickAt: Date | null = null;
  private lastTick: TickSummary | null = null;
  private lastError: string | null = null;

  constructor(private readonly deps: PollerSessionDeps, options: Partial<PollerSessionOptions> = {}) {
    this.options = {
      intervalMs: options.intervalMs ?? config.monitoringIntervalMs,
      horizonMs: options.horizonMs ?? config.dedupHorizonMs,
      fetchLimit: options.fetchLimit ?? config.tradesFetchLimit,
      skipBacklog: options.skipBacklog ?? true,
      clock: options.clock ?? Date.now,
    };
    this.poller = new TradeFeedPoller(deps.marketData, this.options.fetchLimit);
    this.filter = new TradeEventFilter(this.options.horizonMs, this.options.clock);
    this.filter.subscribe(event => this.dispatch(event));
  }

  /**
   * Start polling. The first tick runs immediately.
   */
  start(): void {
    if (this.isRunning) {
      console.log('[Session] Already running');
      return;
    }
    this.isRunning = true;
    console.log(`[Session] Started, polling every ${this.options.intervalMs / 1000}s (dedup window ${this.options.horizonMs / 60000} min)`);

    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    void this.tick();
  }

  /**
   * Stop the timer, then wait for the in-flight tick and queued mirror orders
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const wasRunning = this.isRunning;
    this.isRunning = false;

    if (this.inFlight) {
      await this.inFlight;
    }
    await this.mirrorQueue.drain();
    if (wasRunning) {
      console.log('[Session] Stopped');
    }
  }

  /**
   * Run one poll → filter → dispatch cycle.
   * Returns null without doing anything when a tick is already running.
   */
  async tick(): Promise<TickSummary | null> {
    if (this.inFlight) {
      console.log('[Session] Previous tick still running, skipping');
      return null;
    }
    const run = this.runTick();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Resolves once every mirror order queued so far has finished
   */
  async waitForMirrors(): Promise<void> {
    await this.mirrorQueue.drain();
  }

  getStatus(): SessionStatus {
    return {
      running: this.isRunning,
      tickInFlight: this.inFlight !== null,
      ticks: this.ticks,
      lastTickAt: this.lastTickAt,
      lastTick: this.lastTick,
      lastError: this.lastError,
      seenKeys: this.filter.seenCount,
      primedWallets: this.primedWallets.size,
      pendingMirrorUsers: this.mirrorQueue.pendingKeys,
    };
  }

  private async runTick(): Promise<TickSummary> {
    const summary: TickSummary = { trackedWallets: 0, candidates: 0, primed: 0, emitted: 0, failedWallets: [] };
    try {
      const wallets = this.deps.store.getTrackedWallets();
      summary.trackedWallets = wallets.length;
      // A wallet that stops being tracked is primed again when it comes back
      const tracked = new Set(wallets);
      for (const wallet of this.primedWallets) {
        if (!tracked.has(wallet)) this.primedWallets.delete(wallet);
      }

      if (wallets.length > 0) {
        const nowMs = this.options.clock();
        const since = Math.floor((nowMs - this.options.horizonMs) / 1000);
        const result = await this.poller.poll(wallets, { since });
        summary.failedWallets = result.failedWallets;

        const backlog: TradeEvent[][] = [];
        const live: TradeEvent[][] = [];
        for (const batch of result.batches) {
          summary.candidates += batch.candidates.length;
          if (this.options.skipBacklog && !this.primedWallets.has(batch.wallet)) {
            this.primedWallets.add(batch.wallet);
            backlog.push(batch.candidates);
          } else {
            live.push(batch.candidates);
          }
        }

        if (backlog.length > 0) {
          summary.primed = this.filter.prime(backlog);
          console.log(`[Session] Primed ${backlog.length} new wallet(s), ${summary.primed} existing trade(s) marked as seen`);
        }
        summary.emitted = this.filter.ingest(live).length;
      }
      this.lastError = null;
    } catch (error: unknown) {
      this.lastError = getErrorMessage(error);
      console.error(`[Session] Tick failed: ${this.lastError}`);
      this.deps.notifier.notify({ type: 'error', context: 'poll tick', message: this.lastError });
    }

    this.ticks++;
    this.lastTickAt = new Date(this.options.clock());
    this.lastTick = summary;
    return summary;
  }

  /**
   * Fan one emitted event out to every enabled subscriber of its source wallet
   */
  private dispatch(event: TradeEvent): void {
    const subscriptions = this.deps.store.getActiveSubscriptionsForWallet(event.sourceWallet);
    if (subscriptions.length === 0) {
      return;
    }
    console.log(`[Session] ${tradeEventKey(event)} ${event.side} $${event.volume.toFixed(2)} -> ${subscriptions.length} subscriber(s)`);

    for (const subscription of subscriptions) {
      try {
        this.deps.points.recordTradePoints(subscription.userId, event);
      } catch (error: unknown) {
        const message = getErrorMessage(error);
        console.error(`[Session] Points grant failed for ${subscription.userId}: ${message}`);
        this.deps.notifier.notify({
          type: 'error',
          userId: subscription.userId,
          context: `points ${tradeEventKey(event)}`,
          message,
        });
      }

      void this.mirrorQueue.enqueue(subscription.userId, async () => {
        await this.deps.mirror.mirror(event, subscription);
      });
    }
  }
}
