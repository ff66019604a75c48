import Database from 'better-sqlite3';
import {
  CopySubscription,
  FinalMirrorOutcome,
  MirrorOrder,
  MirrorOutcome,
  NewMirrorOrder,
  NewWallet,
  POINTS_TYPES,
  PointsAuditMismatch,
  PointsGrant,
  PointsHistoryEntry,
  PointsSummary,
  PointsType,
  ReferralListItem,
  TradeSide,
  Wallet,
  WalletSettings,
} from './types.js';
import {
  MAX_REFERRAL_CODE_ATTEMPTS,
  ReferralCodeGenerator,
  fromHundredths,
  generateReferralCode,
  normalizeReferralCode,
  toHundredths,
} from './referrals.js';
import {
  DuplicateWalletError,
  ReferralCodeExhaustedError,
  ReferralError,
  UnknownUserError,
  isUniqueViolation,
} from './utils/errors.js';

interface WalletRow {
  id: number;
  user_id: string;
  handle: string | null;
  address: string;
  credential_ref: string;
  settings: string | null;
  referral_code: string;
  referred_by: string | null;
  total_points: number;
  total_volume: number;
  created_at: string;
}

interface PointsHistoryRow {
  id: number;
  user_id: string;
  points_earned: number;
  points_type: string;
  volume: number | null;
  market_id: string | null;
  market_title: string | null;
  referred_user_id: string | null;
  description: string;
  grant_key: string;
  created_at: string;
}

interface SubscriptionRow {
  user_id: string;
  target_wallet: string;
  target_name: string;
  scale_factor: number;
  enabled: number;
  created_at: string;
}

interface MirrorOrderRow {
  id: number;
  event_key: string;
  user_id: string;
  market_id: string;
  token_id: string;
  side: string;
  requested_size: number;
  price: number | null;
  outcome: string;
  order_id: string | null;
  detail: string | null;
  submitted_at: string;
  finalized_at: string | null;
}

const MIRROR_OUTCOMES: readonly MirrorOutcome[] = ['pending', 'filled', 'killed', 'error', 'skipped'];

const parseSettings = (raw: string | null): WalletSettings => {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
};

const parsePointsType = (raw: string): PointsType => {
  const match = POINTS_TYPES.find(type => type === raw);
  if (!match) {
    throw new Error(`Unexpected points_type in ledger: ${raw}`);
  }
  return match;
};

const parseSide = (raw: string): TradeSide => {
  if (raw !== 'BUY' && raw !== 'SELL') {
    throw new Error(`Unexpected side in ledger: ${raw}`);
  }
  return raw;
};

const parseOutcome = (raw: string): MirrorOutcome => {
  const match = MIRROR_OUTCOMES.find(outcome => outcome === raw);
  if (!match) {
    throw new Error(`Unexpected mirror outcome in ledger: ${raw}`);
  }
  return match;
};

const deserializeWalletRow = (row: WalletRow): Wallet => ({
  id: row.id,
  userId: row.user_id,
  handle: row.handle,
  address: row.address,
  credentialRef: row.credential_ref,
  settings: parseSettings(row.settings),
  referralCode: row.referral_code,
  referredBy: row.referred_by,
  totalPoints: fromHundredths(row.total_points),
  totalVolume: fromHundredths(row.total_volume),
  createdAt: new Date(row.created_at),
});

const deserializeHistoryRow = (row: PointsHistoryRow): PointsHistoryEntry => ({
  id: row.id,
  userId: row.user_id,
  pointsEarned: fromHundredths(row.points_earned),
  pointsType: parsePointsType(row.points_type),
  volume: row.volume === null ? null : fromHundredths(row.volume),
  marketId: row.market_id,
  marketTitle: row.market_title,
  referredUserId: row.referred_user_id,
  description: row.description,
  grantKey: row.grant_key,
  createdAt: new Date(row.created_at),
});

const deserializeSubscriptionRow = (row: SubscriptionRow): CopySubscription => ({
  userId: row.user_id,
  targetWallet: row.target_wallet,
  targetName: row.target_name,
  scaleFactor: row.scale_factor,
  enabled: Boolean(row.enabled),
  createdAt: new Date(row.created_at),
});

const deserializeMirrorOrderRow = (row: MirrorOrderRow): MirrorOrder => ({
  id: row.id,
  eventKey: row.event_key,
  userId: row.user_id,
  marketId: row.market_id,
  tokenId: row.token_id,
  side: parseSide(row.side),
  requestedSize: row.requested_size,
  price: row.price,
  orderType: 'FOK',
  outcome: parseOutcome(row.outcome),
  orderId: row.order_id,
  detail: row.detail,
  submittedAt: new Date(row.submitted_at),
  finalizedAt: row.finalized_at ? new Date(row.finalized_at) : null,
});

export interface SubscriptionInput {
  userId: string;
  targetWallet: string;
  targetName: string;
  scaleFactor?: number;
}

export interface MirrorOrderUpdate {
  orderId?: string | null;
  detail?: string | null;
  price?: number | null;
}

/**
 * Persistent ledger: wallets, referral graph, points history, copy
 * subscriptions and the mirror-order journal.
 *
 * Holds constraints only; point rules live in PointsAccrualEngine.
 */
export class LedgerStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Run `fn` inside one SQLite transaction (nests as a savepoint)
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==========================================================================
  // WALLETS
  // ==========================================================================

  /**
   * Insert a wallet with a freshly generated referral code. A code collision
   * fails only that insert, which is retried with a new code.
   */
  createWallet(
    input: NewWallet,
    generateCode: ReferralCodeGenerator = generateReferralCode,
    maxAttempts: number = MAX_REFERRAL_CODE_ATTEMPTS
  ): Wallet {
    if (this.getWallet(input.userId)) {
      throw new DuplicateWalletError(input.userId);
    }

    const insert = this.db.prepare(
      `INSERT INTO wallets (user_id, handle, address, credential_ref, settings, referral_code, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const code = normalizeReferralCode(generateCode());
      try {
        insert.run(
          input.userId,
          input.handle ?? null,
          input.address.toLowerCase(),
          input.credentialRef,
          JSON.stringify(input.settings ?? {}),
          code,
          this.now().toISOString()
        );
        return this.requireWallet(input.userId);
      } catch (error: unknown) {
        if (isUniqueViolation(error, 'wallets.referral_code')) {
          console.warn(`[Ledger] Referral code collision on attempt ${attempt}/${maxAttempts}, regenerating`);
          continue;
        }
        if (isUniqueViolation(error, 'wallets.user_id')) {
          throw new DuplicateWalletError(input.userId);
        }
        throw error;
      }
    }

    throw new ReferralCodeExhaustedError(maxAttempts);
  }

  getWallet(userId: string): Wallet | null {
    const row = this.db.prepare('SELECT * FROM wallets WHERE user_id = ?').get(userId) as WalletRow | undefined;
    return row ? deserializeWalletRow(row) : null;
  }

  requireWallet(userId: string): Wallet {
    const wallet = this.getWallet(userId);
    if (!wallet) {
      throw new UnknownUserError(userId);
    }
    return wallet;
  }

  getWalletByReferralCode(code: string): Wallet | null {
    const row = this.db.prepare('SELECT * FROM wallets WHERE referral_code = ?')
      .get(normalizeReferralCode(code)) as WalletRow | undefined;
    return row ? deserializeWalletRow(row) : null;
  }

  updateSettings(userId: string, settings: WalletSettings): Wallet {
    const result = this.db.prepare('UPDATE wallets SET settings = ? WHERE user_id = ?')
      .run(JSON.stringify(settings), userId);
    if (result.changes === 0) {
      throw new UnknownUserError(userId);
    }
    return this.requireWallet(userId);
  }

  /**
   * Replace a wallet's referral code. Wallets referred under the old code follow
   * the change through ON UPDATE CASCADE.
   */
  updateReferralCode(userId: string, code: string): Wallet {
    const normalized = normalizeReferralCode(code);
    try {
      const result = this.db.prepare('UPDATE wallets SET referral_code = ? WHERE user_id = ?')
        .run(normalized, userId);
      if (result.changes === 0) {
        throw new UnknownUserError(userId);
      }
    } catch (error: unknown) {
      if (isUniqueViolation(error, 'wallets.referral_code')) {
        throw new ReferralError('CODE_TAKEN', `Referral code ${normalized} is already taken`);
      }
      throw error;
    }
    return this.requireWallet(userId);
  }

  /**
   * Point `userId` at the referrer's code and record the signup grant, atomically.
   * Refuses when the user already has a referrer or already refers others.
   */
  linkReferral(userId: string, referrerCode: string, signupGrant: PointsGrant): PointsHistoryEntry | null {
    return this.transaction(() => {
      const result = this.db.prepare(
        `UPDATE wallets SET referred_by = ?
         WHERE user_id = ? AND referred_by IS NULL
           AND NOT EXISTS (SELECT 1 FROM wallets AS referred WHERE referred.referred_by = wallets.referral_code)`
      ).run(normalizeReferralCode(referrerCode), userId);

      if (result.changes === 0) {
        const wallet = this.requireWallet(userId);
        if (wallet.referredBy !== null) {
          throw new ReferralError('ALREADY_REFERRED', `User ${userId} already has a referrer`);
        }
        throw new ReferralError('CIRCULAR_REFERRAL', `User ${userId} already refers other users and cannot take a referrer`);
      }

      return this.applyGrant(signupGrant);
    });
  }

  // ==========================================================================
  // POINTS
  // ==========================================================================

  /**
   * Append a history entry and increment the wallet's totals in one transaction.
   * Returns null, writing nothing, when the grant key was already recorded.
   */
  applyGrant(grant: PointsGrant): PointsHistoryEntry | null {
    const points = toHundredths(grant.pointsEarned);
    const volumeCredit = toHundredths(grant.volumeCredit ?? 0);
    if (points < 0 || volumeCredit < 0) {
      throw new Error(`Grant ${grant.grantKey} has a negative amount`);
    }

    return this.transaction(() => {
      this.requireWallet(grant.userId);

      let entryId: number | bigint;
      try {
        entryId = this.db.prepare(
          `INSERT INTO points_history
             (user_id, points_earned, points_type, volume, market_id, market_title,
              referred_user_id, description, grant_key, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        ).run(
          grant.userId,
          points,
          grant.pointsType,
          grant.volume === undefined || grant.volume === null ? null : toHundredths(grant.volume),
          grant.marketId ?? null,
          grant.marketTitle ?? null,
          grant.referredUserId ?? null,
          grant.description,
          grant.grantKey,
          this.now().toISOString()
        ).lastInsertRowid;
      } catch (error: unknown) {
        if (isUniqueViolation(error, 'points_history.grant_key')) {
          return null;
        }
        throw error;
      }

      this.db.prepare(
        `UPDATE wallets
         SET total_points = total_points + ?, total_volume = total_volume + ?
         WHERE user_id = ?`
      ).run(points, volumeCredit, grant.userId);

      const row = this.db.prepare('SELECT * FROM points_history WHERE id = ?').get(entryId) as PointsHistoryRow;
      return deserializeHistoryRow(row);
    });
  }

  /**
   * Whether any wallet was referred with this code
   */
  hasReferrals(referralCode: string): boolean {
    return this.db.prepare('SELECT 1 FROM wallets WHERE referred_by = ? LIMIT 1')
      .get(normalizeReferralCode(referralCode)) !== undefined;
  }

  hasGrant(grantKey: string): boolean {
    return this.db.prepare('SELECT 1 FROM points_history WHERE grant_key = ?').get(grantKey) !== undefined;
  }

  getPointsHistory(userId: string, limit = 50): PointsHistoryEntry[] {
    const rows = this.db.prepare(
      'SELECT * FROM points_history WHERE user_id = ? ORDER BY id DESC LIMIT ?'
    ).all(userId, limit) as PointsHistoryRow[];
    return rows.map(deserializeHistoryRow);
  }

  sumPointsHistory(userId: string): number {
    const row = this.db.prepare(
      'SELECT COALESCE(SUM(points_earned), 0) AS total FROM points_history WHERE user_id = ?'
    ).get(userId) as { total: number };
    return fromHundredths(row.total);
  }

  getPointsSummary(userId: string): PointsSummary | null {
    const wallet = this.getWallet(userId);
    if (!wallet) return null;

    const referrals = this.db.prepare('SELECT COUNT(*) AS count FROM wallets WHERE referred_by = ?')
      .get(wallet.referralCode) as { count: number };
    const referralPoints = this.db.prepare(
      `SELECT COALESCE(SUM(points_earned), 0) AS total FROM points_history
       WHERE user_id = ? AND points_type IN ('referral_trade', 'referral_signup')`
    ).get(userId) as { total: number };

    return {
      userId,
      totalPoints: wallet.totalPoints,
      totalVolume: wallet.totalVolume,
      referralCode: wallet.referralCode,
      referredBy: wallet.referredBy,
      referralsCount: referrals.count,
      referralsPoints: fromHundredths(referralPoints.total),
    };
  }

  listReferrals(userId: string, limit = 50): ReferralListItem[] {
    const wallet = this.getWallet(userId);
    if (!wallet) return [];

    const rows = this.db.prepare(
      `SELECT * FROM wallets WHERE referred_by = ? ORDER BY created_at DESC, id DESC LIMIT ?`
    ).all(wallet.referralCode, limit) as WalletRow[];

    return rows.map(row => ({
      userId: row.user_id,
      handle: row.handle,
      totalPoints: fromHundredths(row.total_points),
      totalVolume: fromHundredths(row.total_volume),
      joinedAt: new Date(row.created_at),
    }));
  }

  /**
   * Wallets whose total_points differs from the sum of their history
   */
  auditPoints(): PointsAuditMismatch[] {
    const rows = this.db.prepare(
      `SELECT w.user_id AS user_id, w.total_points AS total_points,
              COALESCE(SUM(p.points_earned), 0) AS history_sum
       FROM wallets w
       LEFT JOIN points_history p ON p.user_id = w.user_id
       GROUP BY w.user_id, w.total_points
       HAVING history_sum <> w.total_points`
    ).all() as Array<{ user_id: string; total_points: number; history_sum: number }>;

    return rows.map(row => ({
      userId: row.user_id,
      totalPoints: fromHundredths(row.total_points),
      historySum: fromHundredths(row.history_sum),
    }));
  }

  // ==========================================================================
  // COPY SUBSCRIPTIONS
  // ==========================================================================

  upsertSubscription(input: SubscriptionInput): CopySubscription {
    this.requireWallet(input.userId);
    const targetWallet = input.targetWallet.toLowerCase();

    this.db.prepare(
      `INSERT INTO copy_subscriptions (user_id, target_wallet, target_name, scale_factor, enabled, created_at)
       VALUES (?, ?, ?, ?, 1, ?)
       ON CONFLICT (user_id, target_wallet) DO UPDATE SET
         target_name = excluded.target_name,
         scale_factor = excluded.scale_factor,
         enabled = 1`
    ).run(input.userId, targetWallet, input.targetName, input.scaleFactor ?? 1, this.now().toISOString());

    const subscription = this.getSubscription(input.userId, targetWallet);
    if (!subscription) {
      throw new Error(`Subscription ${input.userId} -> ${targetWallet} vanished after upsert`);
    }
    return subscription;
  }

  getSubscription(userId: string, targetWallet: string): CopySubscription | null {
    const row = this.db.prepare(
      'SELECT * FROM copy_subscriptions WHERE user_id = ? AND target_wallet = ?'
    ).get(userId, targetWallet.toLowerCase()) as SubscriptionRow | undefined;
    return row ? deserializeSubscriptionRow(row) : null;
  }

  removeSubscription(userId: string, targetWallet: string): boolean {
    const result = this.db.prepare('DELETE FROM copy_subscriptions WHERE user_id = ? AND target_wallet = ?')
      .run(userId, targetWallet.toLowerCase());
    return result.changes > 0;
  }

  setSubscriptionEnabled(userId: string, targetWallet: string, enabled: boolean): CopySubscription | null {
    this.db.prepare('UPDATE copy_subscriptions SET enabled = ? WHERE user_id = ? AND target_wallet = ?')
      .run(enabled ? 1 : 0, userId, targetWallet.toLowerCase());
    return this.getSubscription(userId, targetWallet);
  }

  updateScaleFactor(userId: string, targetWallet: string, scaleFactor: number): CopySubscription | null {
    this.db.prepare('UPDATE copy_subscriptions SET scale_factor = ? WHERE user_id = ? AND target_wallet = ?')
      .run(scaleFactor, userId, targetWallet.toLowerCase());
    return this.getSubscription(userId, targetWallet);
  }

  listSubscriptions(userId: string): CopySubscription[] {
    const rows = this.db.prepare(
      'SELECT * FROM copy_subscriptions WHERE user_id = ? ORDER BY created_at ASC, target_wallet ASC'
    ).all(userId) as SubscriptionRow[];
    return rows.map(deserializeSubscriptionRow);
  }

  getActiveSubscriptionsForWallet(targetWallet: string): CopySubscription[] {
    const rows = this.db.prepare(
      'SELECT * FROM copy_subscriptions WHERE target_wallet = ? AND enabled = 1 ORDER BY user_id ASC'
    ).all(targetWallet.toLowerCase()) as SubscriptionRow[];
    return rows.map(deserializeSubscriptionRow);
  }

  /**
   * Distinct source wallets with at least one enabled subscription
   */
  getTrackedWallets(): string[] {
    const rows = this.db.prepare(
      'SELECT DISTINCT target_wallet FROM copy_subscriptions WHERE enabled = 1 ORDER BY target_wallet ASC'
    ).all() as Array<{ target_wallet: string }>;
    return rows.map(row => row.target_wallet);
  }

  // ==========================================================================
  // MIRROR ORDERS
  // ==========================================================================

  /**
   * Journal a mirror attempt as pending. Returns null when this user already
   * has an order for the event, so each event is submitted at most once.
   */
  beginMirrorOrder(order: NewMirrorOrder): MirrorOrder | null {
    let id: number | bigint;
    try {
      id = this.db.prepare(
        `INSERT INTO mirror_orders
           (event_key, user_id, market_id, token_id, side, requested_size, price, order_type, outcome, submitted_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, 'FOK', 'pending', ?)`
      ).run(
        order.eventKey,
        order.userId,
        order.marketId,
        order.tokenId,
        order.side,
        order.requestedSize,
        order.price,
        this.now().toISOString()
      ).lastInsertRowid;
    } catch (error: unknown) {
      if (isUniqueViolation(error, 'mirror_orders.user_id')) {
        return null;
      }
      throw error;
    }
    return this.getMirrorOrderById(id);
  }

  finalizeMirrorOrder(id: number, outcome: FinalMirrorOutcome, update: MirrorOrderUpdate = {}): MirrorOrder {
    this.db.prepare(
      `UPDATE mirror_orders
       SET outcome = ?, order_id = ?, detail = ?, price = COALESCE(?, price), finalized_at = ?
       WHERE id = ? AND outcome = 'pending'`
    ).run(
      outcome,
      update.orderId ?? null,
      update.detail ?? null,
      update.price ?? null,
      this.now().toISOString(),
      id
    );
    return this.getMirrorOrderById(id);
  }

  getMirrorOrder(userId: string, eventKey: string): MirrorOrder | null {
    const row = this.db.prepare('SELECT * FROM mirror_orders WHERE user_id = ? AND event_key = ?')
      .get(userId, eventKey) as MirrorOrderRow | undefined;
    return row ? deserializeMirrorOrderRow(row) : null;
  }

  listMirrorOrders(userId: string, limit = 50): MirrorOrder[] {
    const rows = this.db.prepare('SELECT * FROM mirror_orders WHERE user_id = ? ORDER BY id DESC LIMIT ?')
      .all(userId, limit) as MirrorOrderRow[];
    return rows.map(deserializeMirrorOrderRow);
  }

  private getMirrorOrderById(id: number | bigint): MirrorOrder {
    const row = this.db.prepare('SELECT * FROM mirror_orders WHERE id = ?').get(id) as MirrorOrderRow | undefined;
    if (!row) {
      throw new Error(`Mirror order ${id} not found`);
    }
    return deserializeMirrorOrderRow(row);
  }
}
