/**
 * Trade direction as reported by the Polymarket data API
 */
export type TradeSide = 'BUY' | 'SELL';

/**
 * A single observed trade from a tracked source wallet.
 * Identity is (sourceWallet, transactionHash), see {@link tradeEventKey}.
 */
export interface TradeEvent {
  sourceWallet: string;     // lowercased
  marketId: string;         // condition id
  tokenId: string;          // outcome asset, used for quoting and ordering
  marketTitle?: string;
  outcome?: string;
  side: TradeSide;
  size: number;             // shares
  price: number;
  volume: number;           // size × price, USDC
  transactionHash: string;  // lowercased
  timestamp: number;        // unix seconds
}

export function tradeEventKey(event: Pick<TradeEvent, 'sourceWallet' | 'transactionHash'>): string {
  return `${event.sourceWallet.toLowerCase()}:${event.transactionHash.toLowerCase()}`;
}

// ============================================================================
// LEDGER
// ============================================================================

export type WalletSettings = Record<string, unknown>;

/**
 * Identity record for a bot user
 */
export interface Wallet {
  id: number;
  userId: string;
  handle: string | null;
  address: string;
  credentialRef: string;    // opaque reference understood by the signer provider
  settings: WalletSettings;
  referralCode: string;
  referredBy: string | null;
  totalPoints: number;
  totalVolume: number;
  createdAt: Date;
}

export interface NewWallet {
  userId: string;
  handle?: string | null;
  address: string;
  credentialRef: string;
  settings?: WalletSettings;
}

export type PointsType = 'trade' | 'referral_trade' | 'referral_signup';

export const POINTS_TYPES: readonly PointsType[] = ['trade', 'referral_trade', 'referral_signup'];

/**
 * A grant waiting to be written. `grantKey` makes the write idempotent.
 */
export interface PointsGrant {
  grantKey: string;
  userId: string;
  pointsEarned: number;
  pointsType: PointsType;
  volume?: number | null;
  marketId?: string | null;
  marketTitle?: string | null;
  referredUserId?: string | null;
  description: string;
  volumeCredit?: number;    // added to the recipient's total volume
}

export interface PointsHistoryEntry {
  id: number;
  userId: string;
  pointsEarned: number;
  pointsType: PointsType;
  volume: number | null;
  marketId: string | null;
  marketTitle: string | null;
  referredUserId: string | null;
  description: string;
  grantKey: string;
  createdAt: Date;
}

export interface PointsSummary {
  userId: string;
  totalPoints: number;
  totalVolume: number;
  referralCode: string;
  referredBy: string | null;
  referralsCount: number;
  referralsPoints: number;
}

export interface ReferralListItem {
  userId: string;
  handle: string | null;
  totalPoints: number;
  totalVolume: number;
  joinedAt: Date;
}

export interface PointsAuditMismatch {
  userId: string;
  totalPoints: number;
  historySum: number;
}

// ============================================================================
// COPY SUBSCRIPTIONS
// ============================================================================

/**
 * A user's subscription to mirror a source wallet
 */
export interface CopySubscription {
  userId: string;
  targetWallet: string;
  targetName: string;
  scaleFactor: number;      // 0.25 = 25% of the original size
  enabled: boolean;
  createdAt: Date;
}

// ============================================================================
// MIRROR ORDERS
// ============================================================================

export type MirrorOutcome = 'pending' | 'filled' | 'killed' | 'error' | 'skipped';

export type FinalMirrorOutcome = Exclude<MirrorOutcome, 'pending'>;

/**
 * An order placed on behalf of a bot user to replicate a TradeEvent.
 * Always fill-or-kill.
 */
export interface MirrorOrder {
  id: number;
  eventKey: string;
  userId: string;
  marketId: string;
  tokenId: string;
  side: TradeSide;
  requestedSize: number;
  price: number | null;
  orderType: 'FOK';
  outcome: MirrorOutcome;
  orderId: string | null;
  detail: string | null;
  submittedAt: Date;
  finalizedAt: Date | null;
}

export interface NewMirrorOrder {
  eventKey: string;
  userId: string;
  marketId: string;
  tokenId: string;
  side: TradeSide;
  requestedSize: number;
  price: number | null;
}

/**
 * Order handed to the order gateway
 */
export interface FokOrderRequest {
  tokenId: string;
  side: TradeSide;
  size: number;
  price: number;
}

export interface OrderSubmissionResult {
  outcome: 'filled' | 'killed' | 'error';
  orderId?: string;
  price?: number;           // price actually sent, after tick rounding
  detail?: string;
}
