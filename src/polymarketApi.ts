import axios, { AxiosInstance } from 'axios';
import { config } from './config.js';
import { TradeEvent, TradeSide } from './types.js';
import { getErrorMessage } from './utils/errors.js';
import { sleep } from './utils/timeout.js';

/**
 * Retry configuration for read-only API requests
 */
export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  retryableStatusCodes: number[];
  retryableErrors: string[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  retryDelayMs: 500,
  retryableStatusCodes: [429, 500, 502, 503, 504], // Rate limit and server errors
  retryableErrors: ['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'ENOTFOUND', 'EAI_AGAIN'],
};

/**
 * Check if an error is worth retrying
 */
export function isRetryableError(error: unknown, retry: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return retry.retryableStatusCodes.includes(error.response.status);
    }
    return error.code !== undefined && retry.retryableErrors.includes(error.code);
  }
  return false;
}

/**
 * Read-only market data the poller and the mirror engine depend on
 */
export interface MarketDataSource {
  /** Most recent trades of a wallet, newest first, as raw API records */
  getWalletTrades(wallet: string, limit: number): Promise<unknown[]>;
  /** Best executable price for taking `side` on a token, or null when that side of the book is empty */
  getBestPrice(tokenId: string, side: TradeSide): Promise<number | null>;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: RawRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function readNumber(record: RawRecord, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function toUnixSeconds(value: number): number {
  return Math.floor(value > 1e12 ? value / 1000 : value);
}

/**
 * Trade timestamps arrive as unix seconds, unix milliseconds or ISO strings
 */
function readTimestampSeconds(record: RawRecord): number | undefined {
  for (const key of ['timestamp', 'created_at', 'match_time']) {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return toUnixSeconds(value);
    }
    if (typeof value === 'string' && value.length > 0) {
      if (/^\d+(\.\d+)?$/.test(value)) {
        return toUnixSeconds(Number(value));
      }
      const ms = Date.parse(value);
      if (Number.isFinite(ms)) return Math.floor(ms / 1000);
    }
  }
  return undefined;
}

/**
 * Normalize a raw data-API trade record into a TradeEvent.
 * Returns null when a field the engine relies on is missing.
 *
 * Data API fields: proxyWallet, side, asset, conditionId, size, price,
 * timestamp (unix seconds), title, outcome, transactionHash
 */
export function normalizeTrade(raw: unknown, walletAddress: string): TradeEvent | null {
  if (!isRecord(raw)) return null;

  const transactionHash = readString(raw, 'transactionHash', 'transaction_hash', 'tx_hash');
  const tokenId = readString(raw, 'asset', 'asset_id', 'token_id', 'tokenId');
  const size = readNumber(raw, 'size', 'amount', 'quantity');
  const price = readNumber(raw, 'price');
  const timestamp = readTimestampSeconds(raw);
  const rawSide = readString(raw, 'side')?.toUpperCase();

  if (!transactionHash || !tokenId || size === undefined || price === undefined || timestamp === undefined) {
    return null;
  }
  if (rawSide !== 'BUY' && rawSide !== 'SELL') {
    return null;
  }
  if (size <= 0 || price <= 0) {
    return null;
  }

  return {
    sourceWallet: walletAddress.toLowerCase(),
    marketId: readString(raw, 'conditionId', 'condition_id', 'market') ?? tokenId,
    tokenId,
    marketTitle: readString(raw, 'title', 'slug'),
    outcome: readString(raw, 'outcome'),
    side: rawSide,
    size,
    price,
    volume: size * price,
    transactionHash: transactionHash.toLowerCase(),
    timestamp,
  };
}

/**
 * Best price to take liquidity on one side of a CLOB book:
 * a BUY lifts the lowest ask, a SELL hits the highest bid.
 * Levels are not assumed to be sorted.
 */
export function bestPriceFromBook(book: unknown, side: TradeSide): number | null {
  if (!isRecord(book)) return null;
  const levels = side === 'BUY' ? book.asks : book.bids;
  if (!Array.isArray(levels)) return null;

  let best: number | null = null;
  for (const level of levels) {
    if (!isRecord(level)) continue;
    const price = readNumber(level, 'price');
    const size = readNumber(level, 'size');
    if (price === undefined || price <= 0 || (size !== undefined && size <= 0)) continue;
    if (best === null || (side === 'BUY' ? price < best : price > best)) {
      best = price;
    }
  }
  return best;
}

export interface PolymarketApiOptions {
  dataApiUrl: string;
  clobApiUrl: string;
  timeoutMs: number;
  retry: RetryConfig;
}

/**
 * Polymarket read-only API client (data API for wallet trades, CLOB for books)
 */
export class PolymarketApi implements MarketDataSource {
  private dataApiClient: AxiosInstance;
  private clobApiClient: AxiosInstance;
  private retry: RetryConfig;

  constructor(options: Partial<PolymarketApiOptions> = {}) {
    const timeout = options.timeoutMs ?? config.httpTimeoutMs;
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;

    const axiosConfig = {
      timeout,
      headers: {
        'Content-Type': 'application/json',
      }
    };

    this.dataApiClient = axios.create({
      ...axiosConfig,
      baseURL: options.dataApiUrl ?? config.polymarketDataApiUrl,
    });

    this.clobApiClient = axios.create({
      ...axiosConfig,
      baseURL: options.clobApiUrl ?? config.polymarketClobApiUrl,
    });
  }

  /**
   * GET /trades?user={wallet}&limit={limit}
   */
  async getWalletTrades(wallet: string, limit: number): Promise<unknown[]> {
    return this.retryRequest(async () => {
      try {
        const response = await this.dataApiClient.get<unknown>('/trades', {
          params: { user: wallet.toLowerCase(), limit }
        });
        return Array.isArray(response.data) ? response.data : [];
      } catch (error: unknown) {
        if (axios.isAxiosError(error) && error.response?.status === 404) {
          return [];
        }
        throw error;
      }
    }, `getWalletTrades(${wallet.substring(0, 8)}...)`);
  }

  /**
   * GET /book?token_id={tokenId}
   */
  async getBestPrice(tokenId: string, side: TradeSide): Promise<number | null> {
    return this.retryRequest(async () => {
      const response = await this.clobApiClient.get<unknown>('/book', {
        params: { token_id: tokenId }
      });
      return bestPriceFromBook(response.data, side);
    }, `getBestPrice(${tokenId.substring(0, 10)}...)`);
  }

  /**
   * Retry wrapper for read requests; only retryable failures are retried
   */
  private async retryRequest<T>(requestFn: () => Promise<T>, operation: string): Promise<T> {
    const retries = this.retry.maxRetries;
    for (let attempt = 0; ; attempt++) {
      try {
        return await requestFn();
      } catch (error: unknown) {
        if (attempt >= retries || !isRetryableError(error, this.retry)) {
          throw error;
        }
        const delay = this.retry.retryDelayMs * Math.pow(2, attempt);
        console.warn(`[API] ${operation} failed (attempt ${attempt + 1}/${retries + 1}), retrying in ${delay}ms: ${getErrorMessage(error)}`);
        await sleep(delay);
      }
    }
  }
}
