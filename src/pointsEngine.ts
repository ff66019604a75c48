import { LedgerStore } from './ledgerStore.js';
import { NotificationSink } from './notifications.js';
import {
  NewWallet,
  PointsAuditMismatch,
  PointsHistoryEntry,
  PointsSummary,
  ReferralListItem,
  TradeEvent,
  Wallet,
  tradeEventKey,
} from './types.js';
import {
  calculateReferralTradePoints,
  calculateTradePoints,
  isValidReferralCode,
  normalizeReferralCode,
  referralSignupBonus,
} from './referrals.js';
import { ReferralError, UnknownUserError } from './utils/errors.js';

export interface TradeGrantResult {
  own: PointsHistoryEntry | null;
  referral: PointsHistoryEntry | null;
}

export interface OnboardingInput extends NewWallet {
  referralCode?: string;
}

export interface OnboardingResult {
  wallet: Wallet;
  signupBonus: PointsHistoryEntry | null;
}

function describeTrade(event: TradeEvent): string {
  const market = event.marketTitle ?? event.marketId;
  return `${event.side} ${event.size} @ ${event.price} on ${market} ($${event.volume.toFixed(2)} volume)`;
}

/**
 * Computes point grants and hands them to the ledger.
 *
 * Every grant carries a key derived from what triggered it, so replaying a
 * trade or a signup never grants twice. Referral attribution is one level:
 * only the direct referrer of the trading user earns a share.
 */
export class PointsAccrualEngine {
  constructor(
    private readonly store: LedgerStore,
    private readonly notifier: NotificationSink
  ) {}

  /**
   * Create a wallet and, when a code is given, link it to the referrer.
   * A rejected referral code rejects the whole onboarding; nothing is written.
   */
  onboardUser(input: OnboardingInput): OnboardingResult {
    const { referralCode, ...walletInput } = input;

    if (referralCode !== undefined) {
      this.resolveReferrer(walletInput.userId, referralCode);
    }

    return this.store.transaction(() => {
      const wallet = this.store.createWallet(walletInput);
      console.log(`[Points] Onboarded ${wallet.userId} with referral code ${wallet.referralCode}`);
      const signupBonus = referralCode !== undefined ? this.registerReferral(wallet.userId, referralCode) : null;
      return { wallet: this.store.requireWallet(wallet.userId), signupBonus };
    });
  }

  /**
   * Attach `userId` to the owner of `code` and grant the signup bonus once.
   * Returns the bonus entry, or null when it had already been granted.
   */
  registerReferral(userId: string, code: string): PointsHistoryEntry | null {
    const wallet = this.store.requireWallet(userId);
    const referrer = this.resolveReferrer(userId, code);

    if (wallet.referredBy !== null) {
      throw new ReferralError('ALREADY_REFERRED', `User ${userId} already has a referrer`);
    }
    // A user who already refers others stays a root, so no link can close a loop
    if (this.store.hasReferrals(wallet.referralCode)) {
      throw new ReferralError('CIRCULAR_REFERRAL', `User ${userId} already refers other users and cannot take a referrer`);
    }

    const entry = this.store.linkReferral(userId, referrer.referralCode, {
      grantKey: `referral_signup:${userId}`,
      userId: referrer.userId,
      pointsEarned: referralSignupBonus(),
      pointsType: 'referral_signup',
      referredUserId: userId,
      description: `Referral signup: ${wallet.handle ?? userId} joined with code ${referrer.referralCode}`,
    });

    console.log(`[Points] ${userId} referred by ${referrer.userId} (${referrer.referralCode})`);
    this.notifier.notify({
      type: 'referral_registered',
      userId,
      referrerUserId: referrer.userId,
      referralCode: referrer.referralCode,
    });

    if (entry) {
      this.notifier.notify({ type: 'points_granted', userId: referrer.userId, entry });
    } else {
      console.warn(`[Points] Signup bonus for ${userId} was already granted, skipping`);
    }
    return entry;
  }

  /**
   * Replace a user's referral code with a custom one (3-7 alphanumerics)
   */
  setCustomReferralCode(userId: string, code: string): Wallet {
    if (!isValidReferralCode(code)) {
      throw new ReferralError('INVALID_FORMAT', 'Referral code must be 3-7 letters or digits');
    }
    const normalized = normalizeReferralCode(code);
    const existing = this.store.getWalletByReferralCode(normalized);
    if (existing && existing.userId !== userId) {
      throw new ReferralError('CODE_TAKEN', `Referral code ${normalized} is already taken`);
    }

    const wallet = this.store.updateReferralCode(userId, normalized);
    console.log(`[Points] ${userId} now uses referral code ${wallet.referralCode}`);
    return wallet;
  }

  /**
   * Grant trade points to `userId` for an observed trade, plus the referral
   * share to their referrer. Both grants commit together.
   */
  recordTradePoints(userId: string, event: TradeEvent): TradeGrantResult {
    const eventKey = tradeEventKey(event);
    const description = describeTrade(event);

    const result = this.store.transaction((): TradeGrantResult => {
      const wallet = this.store.requireWallet(userId);

      const own = this.store.applyGrant({
        grantKey: `trade:${userId}:${eventKey}`,
        userId,
        pointsEarned: calculateTradePoints(event.volume),
        pointsType: 'trade',
        volume: event.volume,
        marketId: event.marketId,
        marketTitle: event.marketTitle ?? null,
        description,
        volumeCredit: event.volume,
      });

      const referrer = wallet.referredBy ? this.store.getWalletByReferralCode(wallet.referredBy) : null;
      const referral = referrer
        ? this.store.applyGrant({
            grantKey: `referral_trade:${userId}:${eventKey}`,
            userId: referrer.userId,
            pointsEarned: calculateReferralTradePoints(event.volume),
            pointsType: 'referral_trade',
            volume: event.volume,
            marketId: event.marketId,
            marketTitle: event.marketTitle ?? null,
            referredUserId: userId,
            description: `Referral share from ${wallet.handle ?? userId}: ${description}`,
          })
        : null;

      return { own, referral };
    });

    if (result.own) {
      this.notifier.notify({ type: 'points_granted', userId, entry: result.own });
    } else {
      console.warn(`[Points] Duplicate trade grant for ${userId} on ${eventKey}, ignored`);
    }
    if (result.referral) {
      this.notifier.notify({ type: 'points_granted', userId: result.referral.userId, entry: result.referral });
    }

    return result;
  }

  getPointsSummary(userId: string): PointsSummary {
    const summary = this.store.getPointsSummary(userId);
    if (!summary) {
      throw new UnknownUserError(userId);
    }
    return summary;
  }

  listReferrals(userId: string, limit?: number): ReferralListItem[] {
    this.store.requireWallet(userId);
    return this.store.listReferrals(userId, limit);
  }

  getPointsHistory(userId: string, limit?: number): PointsHistoryEntry[] {
    this.store.requireWallet(userId);
    return this.store.getPointsHistory(userId, limit);
  }

  /**
   * Users whose total_points no longer equals the sum of their history
   */
  audit(): PointsAuditMismatch[] {
    const mismatches = this.store.auditPoints();
    for (const mismatch of mismatches) {
      console.error(`[Points] Ledger mismatch for ${mismatch.userId}: total=${mismatch.totalPoints}, history=${mismatch.historySum}`);
    }
    return mismatches;
  }

  private resolveReferrer(userId: string, code: string): Wallet {
    if (!isValidReferralCode(code)) {
      throw new ReferralError('INVALID_FORMAT', 'Referral code must be 3-7 letters or digits');
    }
    const referrer = this.store.getWalletByReferralCode(code);
    if (!referrer) {
      throw new ReferralError('UNKNOWN_CODE', `Referral code ${normalizeReferralCode(code)} does not exist`);
    }
    if (referrer.userId === userId) {
      throw new ReferralError('SELF_REFERRAL', 'You cannot use your own referral code');
    }
    return referrer;
  }
}
