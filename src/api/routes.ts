import { Router, Request, Response } from 'express';
import { PollerSession } from '../copyTrader.js';
import { LedgerStore } from '../ledgerStore.js';
import { PointsAccrualEngine } from '../pointsEngine.js';
import { WalletSettings } from '../types.js';
import {
  DuplicateWalletError,
  ReferralCodeExhaustedError,
  ReferralError,
  UnknownUserError,
  getErrorMessage,
} from '../utils/errors.js';
import { isWalletAddress, parseBooleanInput, parseLimit, parseScaleFactor } from '../utils/parsing.js';

export interface ApiServices {
  store: LedgerStore;
  points: PointsAccrualEngine;
  session: PollerSession;
}

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

function readOptionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function statusForError(error: unknown): number {
  if (error instanceof ReferralError) {
    return error.code === 'CODE_TAKEN' || error.code === 'ALREADY_REFERRED' ? 409 : 400;
  }
  if (error instanceof UnknownUserError) return 404;
  if (error instanceof DuplicateWalletError) return 409;
  if (error instanceof ReferralCodeExhaustedError) return 503;
  return 500;
}

function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500) {
    console.error(`[API] ${getErrorMessage(error)}`);
  }
  res.status(status).json({
    success: false,
    error: getErrorMessage(error),
    ...(error instanceof ReferralError ? { code: error.code } : {}),
  });
}

function badRequest(res: Response, error: string): void {
  res.status(400).json({ success: false, error });
}

/**
 * API routes for users, points, referrals, subscriptions and the poller session
 */
export function createRoutes({ store, points, session }: ApiServices): Router {
  const router = Router();

  // ============================================================================
  // USERS & POINTS
  // ============================================================================

  // Onboard a user, optionally with a referral code
  router.post('/users', (req: Request, res: Response) => {
    const body = readBody(req);
    const userId = readOptionalString(body, 'userId');
    const credentialRef = readOptionalString(body, 'credentialRef');
    const referralCode = readOptionalString(body, 'referralCode');
    const address = body.address;

    if (!userId) {
      return badRequest(res, 'userId is required');
    }
    if (!isWalletAddress(address)) {
      return badRequest(res, 'Invalid wallet address format');
    }
    if (!credentialRef) {
      return badRequest(res, 'credentialRef is required');
    }
    let settings: WalletSettings = {};
    if (body.settings !== undefined) {
      const rawSettings = body.settings;
      if (typeof rawSettings !== 'object' || rawSettings === null || Array.isArray(rawSettings)) {
        return badRequest(res, 'settings must be an object');
      }
      settings = Object.fromEntries(Object.entries(rawSettings));
    }

    try {
      const result = points.onboardUser({
        userId,
        handle: readOptionalString(body, 'handle') ?? null,
        address,
        credentialRef,
        settings,
        referralCode,
      });
      res.status(201).json({ success: true, wallet: result.wallet, signupBonus: result.signupBonus });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.get('/users/:userId/points', (req: Request, res: Response) => {
    try {
      res.json({ success: true, points: points.getPointsSummary(req.params.userId) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.get('/users/:userId/points/history', (req: Request, res: Response) => {
    try {
      const history = points.getPointsHistory(req.params.userId, parseLimit(req.query.limit));
      res.json({ success: true, history });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // ============================================================================
  // REFERRALS
  // ============================================================================

  router.get('/users/:userId/referrals', (req: Request, res: Response) => {
    try {
      const referrals = points.listReferrals(req.params.userId, parseLimit(req.query.limit));
      res.json({ success: true, referrals });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // Register the referral code the user signed up with
  router.post('/users/:userId/referral', (req: Request, res: Response) => {
    const code = readOptionalString(readBody(req), 'code');
    if (!code) {
      return badRequest(res, 'code is required');
    }
    try {
      const signupBonus = points.registerReferral(req.params.userId, code);
      res.json({ success: true, signupBonus });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.put('/users/:userId/referral-code', (req: Request, res: Response) => {
    const code = readOptionalString(readBody(req), 'code');
    if (!code) {
      return badRequest(res, 'code is required');
    }
    try {
      const wallet = points.setCustomReferralCode(req.params.userId, code);
      res.json({ success: true, referralCode: wallet.referralCode });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // ============================================================================
  // COPY SUBSCRIPTIONS
  // ============================================================================

  router.get('/users/:userId/subscriptions', (req: Request, res: Response) => {
    try {
      store.requireWallet(req.params.userId);
      res.json({ success: true, subscriptions: store.listSubscriptions(req.params.userId) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // Subscribe to a source wallet (re-subscribing updates and re-enables it)
  router.post('/users/:userId/subscriptions', (req: Request, res: Response) => {
    const body = readBody(req);
    const targetWallet = body.targetWallet;
    if (!isWalletAddress(targetWallet)) {
      return badRequest(res, 'Invalid wallet address format');
    }
    const scaleFactor = parseScaleFactor(body.scaleFactor);
    if (scaleFactor === null) {
      return badRequest(res, 'scaleFactor must be greater than 0 and at most 10');
    }

    try {
      const subscription = store.upsertSubscription({
        userId: req.params.userId,
        targetWallet,
        targetName: readOptionalString(body, 'targetName') ?? `${targetWallet.substring(0, 6)}...${targetWallet.slice(-4)}`,
        scaleFactor,
      });
      console.log(`[API] ${req.params.userId} now copies ${subscription.targetWallet.substring(0, 10)}... at ${scaleFactor}x`);
      res.status(201).json({ success: true, subscription });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.patch('/users/:userId/subscriptions/:wallet', (req: Request, res: Response) => {
    const { userId, wallet } = req.params;
    const body = readBody(req);

    const enabled = parseBooleanInput(body.enabled);
    if (body.enabled !== undefined && enabled === undefined) {
      return badRequest(res, 'enabled must be a boolean');
    }
    const scaleFactor = body.scaleFactor === undefined ? undefined : parseScaleFactor(body.scaleFactor);
    if (scaleFactor === null) {
      return badRequest(res, 'scaleFactor must be greater than 0 and at most 10');
    }

    try {
      if (!store.getSubscription(userId, wallet)) {
        return res.status(404).json({ success: false, error: 'Subscription not found' });
      }
      store.transaction(() => {
        if (enabled !== undefined) store.setSubscriptionEnabled(userId, wallet, enabled);
        if (scaleFactor !== undefined) store.updateScaleFactor(userId, wallet, scaleFactor);
      });
      res.json({ success: true, subscription: store.getSubscription(userId, wallet) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.delete('/users/:userId/subscriptions/:wallet', (req: Request, res: Response) => {
    try {
      const removed = store.removeSubscription(req.params.userId, req.params.wallet);
      if (!removed) {
        return res.status(404).json({ success: false, error: 'Subscription not found' });
      }
      res.json({ success: true, message: 'Subscription removed' });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.get('/users/:userId/mirror-orders', (req: Request, res: Response) => {
    try {
      store.requireWallet(req.params.userId);
      const orders = store.listMirrorOrders(req.params.userId, parseLimit(req.query.limit));
      res.json({ success: true, orders });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // ============================================================================
  // LEDGER & SESSION
  // ============================================================================

  router.get('/ledger/audit', (req: Request, res: Response) => {
    try {
      const mismatches = points.audit();
      res.json({ success: true, consistent: mismatches.length === 0, mismatches });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.get('/session/status', (req: Request, res: Response) => {
    res.json({ success: true, status: session.getStatus(), trackedWallets: store.getTrackedWallets() });
  });

  router.post('/session/start', (req: Request, res: Response) => {
    session.start();
    res.json({ success: true, status: session.getStatus() });
  });

  router.post('/session/stop', async (req: Request, res: Response) => {
    try {
      await session.stop();
      res.json({ success: true, status: session.getStatus() });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
