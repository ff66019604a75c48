import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { AxiosError } from 'axios';
import express from 'express';
import { Server } from 'http';
import {
  DEFAULT_RETRY_CONFIG,
  PolymarketApi,
  bestPriceFromBook,
  isRetryableError,
  normalizeTrade,
} from '../src/polymarketApi.js';
import { WALLET_A, rawTrade } from './helpers.js';

describe('normalizeTrade', () => {
  it('maps a data-API record onto a TradeEvent', () => {
    const trade = normalizeTrade(rawTrade(), WALLET_A.toUpperCase().replace('0X', '0x'));
    assert.deepEqual(trade, {
      sourceWallet: WALLET_A,
      marketId: 'cond-1',
      tokenId: 'token-1',
      marketTitle: 'Will it rain tomorrow?',
      outcome: 'Yes',
      side: 'BUY',
      size: 100,
      price: 0.5,
      volume: 50,
      transactionHash: '0xaa',
      timestamp: 100,
    });
  });

  it('accepts string numbers, lowercase sides and millisecond timestamps', () => {
    const trade = normalizeTrade(rawTrade({ size: '10', price: '0.25', side: 'sell', timestamp: 1_700_000_000_123 }), WALLET_A);
    assert.equal(trade?.size, 10);
    assert.equal(trade?.price, 0.25);
    assert.equal(trade?.volume, 2.5);
    assert.equal(trade?.side, 'SELL');
    assert.equal(trade?.timestamp, 1_700_000_000);
  });

  it('reads ISO timestamps', () => {
    const trade = normalizeTrade(rawTrade({ timestamp: undefined, created_at: '2026-01-01T00:00:10Z' }), WALLET_A);
    assert.equal(trade?.timestamp, 1767225610);
  });

  it('falls back to the token id when there is no condition id', () => {
    const trade = normalizeTrade(rawTrade({ conditionId: undefined }), WALLET_A);
    assert.equal(trade?.marketId, 'token-1');
  });

  it('rejects records missing what the engine relies on', () => {
    assert.equal(normalizeTrade(rawTrade({ transactionHash: undefined }), WALLET_A), null);
    assert.equal(normalizeTrade(rawTrade({ asset: undefined }), WALLET_A), null);
    assert.equal(normalizeTrade(rawTrade({ side: 'HOLD' }), WALLET_A), null);
    assert.equal(normalizeTrade(rawTrade({ size: 0 }), WALLET_A), null);
    assert.equal(normalizeTrade(rawTrade({ price: 'abc' }), WALLET_A), null);
    assert.equal(normalizeTrade(rawTrade({ timestamp: undefined }), WALLET_A), null);
    assert.equal(normalizeTrade('not a record', WALLET_A), null);
    assert.equal(normalizeTrade(null, WALLET_A), null);
  });
});

describe('bestPriceFromBook', () => {
  const book = {
    asks: [
      { price: '0.55', size: '10' },
      { price: '0.52', size: '5' },
      { price: '0.50', size: '0' },
    ],
    bids: [
      { price: '0.47', size: '8' },
      { price: '0.49', size: '3' },
    ],
  };

  it('takes the lowest ask with size for a BUY', () => {
    assert.equal(bestPriceFromBook(book, 'BUY'), 0.52);
  });

  it('takes the highest bid for a SELL', () => {
    assert.equal(bestPriceFromBook(book, 'SELL'), 0.49);
  });

  it('returns null for an empty or malformed side', () => {
    assert.equal(bestPriceFromBook({ asks: [], bids: [] }, 'BUY'), null);
    assert.equal(bestPriceFromBook({ bids: 'nope' }, 'SELL'), null);
    assert.equal(bestPriceFromBook(undefined, 'BUY'), null);
  });
});

describe('isRetryableError', () => {
  it('retries network codes but not client errors', () => {
    assert.equal(isRetryableError(new AxiosError('reset', 'ECONNRESET')), true);
    assert.equal(isRetryableError(new AxiosError('bad request', 'ERR_BAD_REQUEST')), false);
    assert.equal(isRetryableError(new Error('plain')), false);
  });
});

describe('PolymarketApi against a local server', () => {
  let server: Server;
  let baseUrl = '';
  let tradesHits = 0;
  const requestedUsers: string[] = [];

  before(async () => {
    const app = express();
    app.get('/trades', (req, res) => {
      tradesHits++;
      const user = String(req.query.user);
      requestedUsers.push(user);
      if (user === '0xflaky' && tradesHits === 1) {
        res.status(503).json({ error: 'busy' });
        return;
      }
      if (user === '0xmissing') {
        res.status(404).json({ error: 'not found' });
        return;
      }
      if (user === '0xbroken') {
        res.status(400).json({ error: 'bad user' });
        return;
      }
      res.json([rawTrade({ limit: Number(req.query.limit) })]);
    });
    app.get('/book', (req, res) => {
      res.json({
        market: req.query.token_id,
        asks: [{ price: '0.61', size: '20' }, { price: '0.6', size: '4' }],
        bids: [{ price: '0.58', size: '9' }],
      });
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  function createApi(): PolymarketApi {
    return new PolymarketApi({
      dataApiUrl: baseUrl,
      clobApiUrl: baseUrl,
      timeoutMs: 2000,
      retry: { ...DEFAULT_RETRY_CONFIG, retryDelayMs: 1 },
    });
  }

  it('retries a 503 and returns the trades', async () => {
    tradesHits = 0;
    const trades = await createApi().getWalletTrades('0xFLAKY', 25);
    assert.equal(tradesHits, 2);
    assert.equal(trades.length, 1);
    assert.deepEqual(requestedUsers.slice(-2), ['0xflaky', '0xflaky']);
    const first: unknown = trades[0];
    assert.ok(typeof first === 'object' && first !== null && 'limit' in first && first.limit === 25);
  });

  it('treats a 404 as no trades', async () => {
    assert.deepEqual(await createApi().getWalletTrades('0xmissing', 10), []);
  });

  it('does not retry a 400', async () => {
    tradesHits = 0;
    await assert.rejects(createApi().getWalletTrades('0xbroken', 10));
    assert.equal(tradesHits, 1);
  });

  it('quotes the best price from /book', async () => {
    const api = createApi();
    assert.equal(await api.getBestPrice('token-1', 'BUY'), 0.6);
    assert.equal(await api.getBestPrice('token-1', 'SELL'), 0.58);
  });
});
