import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase } from '../src/database.js';
import { LedgerStore } from '../src/ledgerStore.js';
import { DuplicateWalletError, ReferralCodeExhaustedError, ReferralError, UnknownUserError } from '../src/utils/errors.js';
import { PointsGrant } from '../src/types.js';
import { WALLET_A, WALLET_B, addWallet, createTestStore } from './helpers.js';

function tradeGrant(userId: string, overrides: Partial<PointsGrant> = {}): PointsGrant {
  return {
    grantKey: `trade:${userId}:${WALLET_A}:0xaa`,
    userId,
    pointsEarned: 12.34,
    pointsType: 'trade',
    volume: 12.34,
    volumeCredit: 12.34,
    marketId: 'cond-1',
    description: 'BUY 24.68 @ 0.5 on cond-1 ($12.34 volume)',
    ...overrides,
  };
}

describe('LedgerStore wallets', () => {
  it('creates a wallet with a normalized code and zero totals', () => {
    const store = createTestStore();
    const wallet = store.createWallet(
      { userId: 'u1', handle: '@u1', address: '0xABCDEF', credentialRef: 'env:TEST_KEY', settings: { slippage: 2 } },
      () => 'abc1234'
    );

    assert.equal(wallet.userId, 'u1');
    assert.equal(wallet.referralCode, 'ABC1234');
    assert.equal(wallet.address, '0xabcdef');
    assert.equal(wallet.referredBy, null);
    assert.equal(wallet.totalPoints, 0);
    assert.equal(wallet.totalVolume, 0);
    assert.deepEqual(wallet.settings, { slippage: 2 });
    assert.equal(wallet.createdAt.toISOString(), '2026-01-01T00:00:00.000Z');
  });

  it('regenerates the referral code on a collision', () => {
    const store = createTestStore();
    addWallet(store, 'existing', 'AAAAAAA');

    const codes = ['AAAAAAA', 'BBBBBBB'];
    const wallet = store.createWallet(
      { userId: 'u2', address: WALLET_B, credentialRef: 'env:TEST_KEY' },
      () => codes.shift() ?? 'ZZZZZZZ'
    );

    assert.equal(wallet.referralCode, 'BBBBBBB');
    assert.deepEqual(codes, []);
  });

  it('gives up after the attempt limit and writes nothing', () => {
    const store = createTestStore();
    addWallet(store, 'existing', 'AAAAAAA');

    assert.throws(
      () => store.createWallet({ userId: 'u2', address: WALLET_B, credentialRef: 'env:TEST_KEY' }, () => 'AAAAAAA', 3),
      (error: unknown) => error instanceof ReferralCodeExhaustedError && error.attempts === 3
    );
    assert.equal(store.getWallet('u2'), null);
  });

  it('refuses a second wallet for the same user', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    assert.throws(() => addWallet(store, 'u1'), DuplicateWalletError);
  });

  it('looks wallets up by referral code case-insensitively', () => {
    const store = createTestStore();
    addWallet(store, 'u1', 'LOOKUP1');
    assert.equal(store.getWalletByReferralCode(' lookup1 ')?.userId, 'u1');
    assert.equal(store.getWalletByReferralCode('NOPE123'), null);
  });

  it('requireWallet throws for unknown users', () => {
    const store = createTestStore();
    assert.throws(() => store.requireWallet('ghost'), UnknownUserError);
  });

  it('updates settings', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    assert.deepEqual(store.updateSettings('u1', { notifications: false }).settings, { notifications: false });
    assert.throws(() => store.updateSettings('ghost', {}), UnknownUserError);
  });
});

describe('LedgerStore referral codes', () => {
  it('a changed code carries its referred wallets along', () => {
    const store = createTestStore();
    addWallet(store, 'referrer', 'OLDCODE');
    addWallet(store, 'referred');
    store.linkReferral('referred', 'OLDCODE', tradeGrant('referrer', {
      grantKey: 'referral_signup:referred',
      pointsEarned: 100,
      pointsType: 'referral_signup',
      volumeCredit: 0,
    }));

    const updated = store.updateReferralCode('referrer', 'new1');

    assert.equal(updated.referralCode, 'NEW1');
    assert.equal(store.getWallet('referred')?.referredBy, 'NEW1');
    assert.deepEqual(store.listReferrals('referrer').map(r => r.userId), ['referred']);
  });

  it('a code owned by someone else is refused', () => {
    const store = createTestStore();
    addWallet(store, 'u1', 'TAKEN1');
    addWallet(store, 'u2', 'MINE22');

    assert.throws(
      () => store.updateReferralCode('u2', 'taken1'),
      (error: unknown) => error instanceof ReferralError && error.code === 'CODE_TAKEN'
    );
    assert.equal(store.getWallet('u2')?.referralCode, 'MINE22');
  });

  it('linkReferral refuses a wallet that already has a referrer', () => {
    const store = createTestStore();
    addWallet(store, 'r1', 'REFONE1');
    addWallet(store, 'r2', 'REFTWO2');
    addWallet(store, 'u1');
    const grant = (key: string, userId: string): PointsGrant => ({
      grantKey: key,
      userId,
      pointsEarned: 100,
      pointsType: 'referral_signup',
      description: 'signup',
    });

    store.linkReferral('u1', 'REFONE1', grant('referral_signup:u1', 'r1'));
    assert.throws(
      () => store.linkReferral('u1', 'REFTWO2', grant('referral_signup:u1:again', 'r2')),
      (error: unknown) => error instanceof ReferralError && error.code === 'ALREADY_REFERRED'
    );

    assert.equal(store.getWallet('u1')?.referredBy, 'REFONE1');
    assert.equal(store.getWallet('r2')?.totalPoints, 0);
    assert.equal(store.hasGrant('referral_signup:u1:again'), false);
  });
});

describe('LedgerStore referral links', () => {
  it('linkReferral refuses a wallet that already refers others', () => {
    const store = createTestStore();
    addWallet(store, 'root', 'ROOT001');
    addWallet(store, 'middle', 'MIDDLE1');
    addWallet(store, 'leaf');
    const signup = (userId: string, referrer: string): PointsGrant => ({
      grantKey: `referral_signup:${userId}`,
      userId: referrer,
      pointsEarned: 100,
      pointsType: 'referral_signup',
      description: 'signup',
    });

    store.linkReferral('leaf', 'MIDDLE1', signup('leaf', 'middle'));
    assert.equal(store.hasReferrals('middle1'), true);
    assert.equal(store.hasReferrals('ROOT001'), false);

    assert.throws(
      () => store.linkReferral('middle', 'ROOT001', signup('middle', 'root')),
      (error: unknown) => error instanceof ReferralError && error.code === 'CIRCULAR_REFERRAL'
    );
    assert.equal(store.getWallet('middle')?.referredBy, null);
    assert.equal(store.getWallet('root')?.totalPoints, 0);
    assert.equal(store.hasGrant('referral_signup:middle'), false);
  });
});

describe('LedgerStore points', () => {
  it('applies a grant to history and totals together', () => {
    const store = createTestStore();
    addWallet(store, 'u1');

    const entry = store.applyGrant(tradeGrant('u1'));

    assert.ok(entry);
    assert.equal(entry.pointsEarned, 12.34);
    assert.equal(entry.volume, 12.34);
    assert.equal(entry.pointsType, 'trade');
    assert.equal(store.getWallet('u1')?.totalPoints, 12.34);
    assert.equal(store.getWallet('u1')?.totalVolume, 12.34);
    assert.equal(store.hasGrant(entry.grantKey), true);
  });

  it('a repeated grant key changes nothing', () => {
    const store = createTestStore();
    addWallet(store, 'u1');

    store.applyGrant(tradeGrant('u1'));
    assert.equal(store.applyGrant(tradeGrant('u1', { pointsEarned: 99 })), null);

    assert.equal(store.getWallet('u1')?.totalPoints, 12.34);
    assert.equal(store.getPointsHistory('u1').length, 1);
  });

  it('sums stay exact across many fractional grants', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    for (let i = 0; i < 10; i++) {
      store.applyGrant(tradeGrant('u1', { grantKey: `k${i}`, pointsEarned: 0.1, volumeCredit: 0.1 }));
    }
    assert.equal(store.getWallet('u1')?.totalPoints, 1);
    assert.equal(store.sumPointsHistory('u1'), 1);
    assert.equal(store.getWallet('u1')?.totalVolume, 1);
  });

  it('negative amounts are rejected', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    assert.throws(() => store.applyGrant(tradeGrant('u1', { pointsEarned: -1 })), /negative amount/);
    assert.equal(store.getPointsHistory('u1').length, 0);
  });

  it('grants for an unknown user are rejected', () => {
    const store = createTestStore();
    assert.throws(() => store.applyGrant(tradeGrant('ghost')), UnknownUserError);
  });

  it('history is newest first and limited', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    store.applyGrant(tradeGrant('u1', { grantKey: 'first' }));
    store.applyGrant(tradeGrant('u1', { grantKey: 'second' }));
    store.applyGrant(tradeGrant('u1', { grantKey: 'third' }));

    assert.deepEqual(store.getPointsHistory('u1', 2).map(e => e.grantKey), ['third', 'second']);
  });

  it('summary counts referrals and referral points', () => {
    const store = createTestStore();
    addWallet(store, 'r1', 'REFSUM1');
    addWallet(store, 'u1');
    store.linkReferral('u1', 'REFSUM1', {
      grantKey: 'referral_signup:u1',
      userId: 'r1',
      pointsEarned: 100,
      pointsType: 'referral_signup',
      referredUserId: 'u1',
      description: 'signup',
    });
    store.applyGrant(tradeGrant('r1', { grantKey: 'own', pointsEarned: 5, volumeCredit: 5 }));
    store.applyGrant(tradeGrant('r1', { grantKey: 'share', pointsEarned: 1.5, pointsType: 'referral_trade', volumeCredit: 0 }));

    assert.deepEqual(store.getPointsSummary('r1'), {
      userId: 'r1',
      totalPoints: 106.5,
      totalVolume: 5,
      referralCode: 'REFSUM1',
      referredBy: null,
      referralsCount: 1,
      referralsPoints: 101.5,
    });
    assert.equal(store.getPointsSummary('ghost'), null);
  });

  it('audit reports wallets whose totals drifted from their history', () => {
    const db = openDatabase(':memory:');
    const store = new LedgerStore(db, () => new Date('2026-01-01T00:00:00.000Z'));
    addWallet(store, 'u1');
    addWallet(store, 'u2');
    store.applyGrant(tradeGrant('u1'));

    assert.deepEqual(store.auditPoints(), []);

    db.prepare('UPDATE wallets SET total_points = total_points + 500 WHERE user_id = ?').run('u2');
    assert.deepEqual(store.auditPoints(), [{ userId: 'u2', totalPoints: 5, historySum: 0 }]);
  });
});

describe('LedgerStore subscriptions', () => {
  it('upserts, lists and tracks enabled source wallets', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    addWallet(store, 'u2');

    store.upsertSubscription({ userId: 'u1', targetWallet: WALLET_A.toUpperCase().replace('0X', '0x'), targetName: 'Whale' });
    store.upsertSubscription({ userId: 'u2', targetWallet: WALLET_A, targetName: 'Whale', scaleFactor: 0.5 });
    store.upsertSubscription({ userId: 'u2', targetWallet: WALLET_B, targetName: 'Other' });

    const u1 = store.listSubscriptions('u1');
    assert.equal(u1.length, 1);
    assert.equal(u1[0].targetWallet, WALLET_A);
    assert.equal(u1[0].scaleFactor, 1);
    assert.equal(u1[0].enabled, true);

    assert.deepEqual(store.getTrackedWallets(), [WALLET_A, WALLET_B]);
    assert.deepEqual(store.getActiveSubscriptionsForWallet(WALLET_A).map(s => s.userId), ['u1', 'u2']);
  });

  it('upserting again updates the name and scale and re-enables', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    store.upsertSubscription({ userId: 'u1', targetWallet: WALLET_A, targetName: 'Old' });
    store.setSubscriptionEnabled('u1', WALLET_A, false);

    const updated = store.upsertSubscription({ userId: 'u1', targetWallet: WALLET_A, targetName: 'New', scaleFactor: 2 });

    assert.equal(updated.targetName, 'New');
    assert.equal(updated.scaleFactor, 2);
    assert.equal(updated.enabled, true);
    assert.equal(store.listSubscriptions('u1').length, 1);
  });

  it('disabled subscriptions stop tracking their wallet', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    store.upsertSubscription({ userId: 'u1', targetWallet: WALLET_A, targetName: 'Whale' });

    assert.equal(store.setSubscriptionEnabled('u1', WALLET_A, false)?.enabled, false);
    assert.deepEqual(store.getTrackedWallets(), []);
    assert.deepEqual(store.getActiveSubscriptionsForWallet(WALLET_A), []);
  });

  it('scale factor updates and removal report missing subscriptions', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    store.upsertSubscription({ userId: 'u1', targetWallet: WALLET_A, targetName: 'Whale' });

    assert.equal(store.updateScaleFactor('u1', WALLET_A, 0.25)?.scaleFactor, 0.25);
    assert.equal(store.updateScaleFactor('u1', WALLET_B, 0.25), null);
    assert.equal(store.removeSubscription('u1', WALLET_A), true);
    assert.equal(store.removeSubscription('u1', WALLET_A), false);
  });

  it('subscribing an unknown user is rejected', () => {
    const store = createTestStore();
    assert.throws(
      () => store.upsertSubscription({ userId: 'ghost', targetWallet: WALLET_A, targetName: 'Whale' }),
      UnknownUserError
    );
  });
});

describe('LedgerStore mirror orders', () => {
  const newOrder = {
    eventKey: `${WALLET_A}:0xaa`,
    userId: 'u1',
    marketId: 'cond-1',
    tokenId: 'token-1',
    side: 'BUY' as const,
    requestedSize: 10,
    price: null,
  };

  it('journals an order once per user and event', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    addWallet(store, 'u2');

    const first = store.beginMirrorOrder(newOrder);
    assert.ok(first);
    assert.equal(first.outcome, 'pending');
    assert.equal(first.orderType, 'FOK');
    assert.equal(first.finalizedAt, null);

    assert.equal(store.beginMirrorOrder(newOrder), null);
    assert.ok(store.beginMirrorOrder({ ...newOrder, userId: 'u2' }));
  });

  it('finalize only moves an order out of pending', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    const order = store.beginMirrorOrder(newOrder);
    assert.ok(order);

    const filled = store.finalizeMirrorOrder(order.id, 'filled', { orderId: 'order-1', price: 0.52 });
    assert.equal(filled.outcome, 'filled');
    assert.equal(filled.orderId, 'order-1');
    assert.equal(filled.price, 0.52);
    assert.ok(filled.finalizedAt);

    const again = store.finalizeMirrorOrder(order.id, 'error', { detail: 'late' });
    assert.equal(again.outcome, 'filled');
    assert.equal(again.detail, null);
  });

  it('finalize keeps the journaled price when none is given', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    const order = store.beginMirrorOrder({ ...newOrder, price: 0.4 });
    assert.ok(order);

    assert.equal(store.finalizeMirrorOrder(order.id, 'killed', { detail: 'no match' }).price, 0.4);
  });

  it('lists orders newest first and finds them by event', () => {
    const store = createTestStore();
    addWallet(store, 'u1');
    store.beginMirrorOrder(newOrder);
    store.beginMirrorOrder({ ...newOrder, eventKey: `${WALLET_A}:0xbb` });

    assert.deepEqual(store.listMirrorOrders('u1').map(o => o.eventKey), [`${WALLET_A}:0xbb`, `${WALLET_A}:0xaa`]);
    assert.equal(store.getMirrorOrder('u1', `${WALLET_A}:0xaa`)?.requestedSize, 10);
    assert.equal(store.getMirrorOrder('u1', 'missing'), null);
  });
});
