import { ApiKeyCreds, Chain, ClobClient, OrderType, Side, TickSize } from '@polymarket/clob-client';
import axios from 'axios';
import * as ethers from 'ethers';
import { config } from './config.js';
import { FokOrderRequest, OrderSubmissionResult, Wallet } from './types.js';
import { getErrorMessage } from './utils/errors.js';

/**
 * Signs and submits fill-or-kill orders on behalf of a bot user
 */
export interface OrderGateway {
  submitFok(userId: string, order: FokOrderRequest): Promise<OrderSubmissionResult>;
}

/**
 * Resolves a wallet's opaque credential reference to a signer.
 * Implementations own the key material; nothing else reads it.
 */
export interface SignerProvider {
  getSigner(wallet: SignerSubject): Promise<ethers.Wallet>;
}

export type SignerSubject = Pick<Wallet, 'userId' | 'credentialRef'>;

/**
 * Credential references of the form `env:VAR_NAME`, read from the process environment
 */
export class EnvSignerProvider implements SignerProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSigner(wallet: SignerSubject): Promise<ethers.Wallet> {
    const match = /^env:([A-Z0-9_]+)$/.exec(wallet.credentialRef);
    if (!match) {
      throw new Error(`Unsupported credential reference for ${wallet.userId}`);
    }
    const key = this.env[match[1]];
    if (!key) {
      throw new Error(`Signing key for ${wallet.userId} is not configured (${match[1]})`);
    }
    return new ethers.Wallet(key);
  }
}

/**
 * A ready, authenticated client that places one FOK order.
 * Returns the raw CLOB response and the price actually sent.
 */
export interface FokOrderPlacer {
  place(order: FokOrderRequest): Promise<{ response: unknown; price: number }>;
}

export type FokOrderPlacerFactory = (signer: ethers.Wallet) => Promise<FokOrderPlacer>;

// Polymarket's kill message: "order couldn't be fully filled. FOK orders are fully filled or killed."
const KILLED_PATTERN = /fully filled or killed|couldn't be fully filled|no (?:orders found to match|liquidity|match)|not enough liquidity/i;

const SIGNATURE_TYPE_NAMES: Record<number, string> = {
  0: 'EOA',
  1: 'POLY_PROXY',
  2: 'POLY_GNOSIS_SAFE',
};

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tickDecimals(tickSize: string): number {
  const dot = tickSize.indexOf('.');
  return dot === -1 ? 0 : tickSize.length - dot - 1;
}

/**
 * Round a price to the market's tick. The CLOB rejects off-tick prices.
 */
export function roundToTick(price: number, tickSize: string): number {
  const tick = parseFloat(tickSize);
  if (!Number.isFinite(tick) || tick <= 0) {
    return price;
  }
  return Number((Math.round(price / tick) * tick).toFixed(tickDecimals(tickSize)));
}

function readErrorText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return JSON.stringify(value);
}

/**
 * Map a postOrder response onto filled / killed / error.
 *
 * Success: { success: true, orderID, status: 'matched', errorMsg: '' }
 * Failure: { error, status } where status is the HTTP status
 */
export function classifyOrderResponse(response: unknown): OrderSubmissionResult {
  if (typeof response === 'string') {
    const blocked = response.includes('<html') || response.includes('<!DOCTYPE') || response.includes('Cloudflare');
    return {
      outcome: 'error',
      detail: blocked ? 'Received an HTML page instead of JSON, request was blocked' : response.slice(0, 200),
    };
  }
  if (!isRecord(response) || Object.keys(response).length === 0) {
    return { outcome: 'error', detail: 'Empty response from CLOB, order was not placed' };
  }

  const errorText = readErrorText(response.error) || readErrorText(response.errorMsg);
  const status = typeof response.status === 'string' && /^\d+$/.test(response.status)
    ? parseInt(response.status, 10)
    : response.status;
  const orderIdValue = response.orderID ?? response.orderId;
  const orderId = typeof orderIdValue === 'string' && orderIdValue.length > 0 ? orderIdValue : undefined;

  const httpFailure = typeof status === 'number' && status >= 400;
  if (httpFailure || (errorText && response.success !== true)) {
    if (KILLED_PATTERN.test(errorText)) {
      return { outcome: 'killed', orderId, detail: errorText };
    }
    return {
      outcome: 'error',
      orderId,
      detail: errorText || `CLOB returned HTTP ${String(status)}`,
    };
  }

  if (status === 'unmatched') {
    return { outcome: 'killed', orderId, detail: 'Order was not matched' };
  }

  if (!orderId) {
    return { outcome: 'error', detail: `CLOB response missing orderID: ${JSON.stringify(response).slice(0, 200)}` };
  }

  return { outcome: 'filled', orderId };
}

/**
 * Classify an exception thrown while signing or posting an order
 */
export function classifyOrderError(error: unknown): OrderSubmissionResult {
  if (axios.isAxiosError(error) && error.response) {
    const { data, status } = error.response;
    if (status === 403) {
      return { outcome: 'error', detail: 'Request blocked (403 Forbidden)' };
    }
    return classifyOrderResponse(isRecord(data) ? { ...data, status } : { error: readErrorText(data), status });
  }
  const message = getErrorMessage(error);
  if (KILLED_PATTERN.test(message)) {
    return { outcome: 'killed', detail: message };
  }
  return { outcome: 'error', detail: message };
}

/**
 * Authenticate against the CLOB for one signer.
 *
 * L1 auth (createOrDeriveApiKey) needs only the signer. The trading client
 * then gets the derived L2 credentials, signature type and funder.
 */
export const createClobOrderPlacer: FokOrderPlacerFactory = async (signer) => {
  const host = config.polymarketClobApiUrl;

  const tempClient = new ClobClient(host, Chain.POLYGON, signer);
  let creds: ApiKeyCreds;
  try {
    creds = await tempClient.createOrDeriveApiKey();
  } catch (error: unknown) {
    throw new Error(`Cannot trade without L2 API credentials: ${getErrorMessage(error)}`);
  }
  if (!creds.key || !creds.secret || !creds.passphrase) {
    throw new Error('Failed to obtain valid L2 API credentials. The wallet may not be registered on Polymarket.');
  }

  const signatureType = config.polymarketSignatureType;
  const funderAddress = config.polymarketFunderAddress || signer.address;
  const client = new ClobClient(host, Chain.POLYGON, signer, creds, signatureType, funderAddress);

  console.log(`[CLOB] Client ready for ${signer.address.substring(0, 10)}... ` +
    `(signature type ${signatureType} ${SIGNATURE_TYPE_NAMES[signatureType] ?? 'UNKNOWN'}, funder ${funderAddress.substring(0, 10)}...)`);

  return {
    async place(order: FokOrderRequest) {
      const tickSize: TickSize = await client.getTickSize(order.tokenId);
      const negRisk = await client.getNegRisk(order.tokenId);

      const price = roundToTick(order.price, tickSize);
      const tick = parseFloat(tickSize);
      if (price < tick || price > 1 - tick) {
        throw new Error(`Invalid price after rounding: ${price} (quoted ${order.price}, tickSize ${tickSize})`);
      }

      console.log(`[CLOB] Placing FOK ${order.side} ${order.size} @ ${price} on ${order.tokenId.substring(0, 20)}... (tick ${tickSize}, negRisk ${negRisk})`);
      const signed = await client.createOrder(
        {
          tokenID: order.tokenId,
          price,
          size: order.size,
          side: order.side === 'BUY' ? Side.BUY : Side.SELL,
        },
        { tickSize, negRisk }
      );
      const response: unknown = await client.postOrder(signed, OrderType.FOK);
      return { response, price };
    },
  };
};

/**
 * Order gateway backed by @polymarket/clob-client.
 * Keeps one authenticated client per user; a failed authentication is retried on the next order.
 */
export class PolymarketClobClient implements OrderGateway {
  private placers = new Map<string, Promise<FokOrderPlacer>>();

  constructor(
    private readonly lookupWallet: (userId: string) => Wallet,
    private readonly signers: SignerProvider,
    private readonly createPlacer: FokOrderPlacerFactory = createClobOrderPlacer
  ) {}

  async submitFok(userId: string, order: FokOrderRequest): Promise<OrderSubmissionResult> {
    let placer: FokOrderPlacer;
    try {
      placer = await this.getPlacer(userId);
    } catch (error: unknown) {
      console.error(`[CLOB] Authentication failed for ${userId}: ${getErrorMessage(error)}`);
      return { outcome: 'error', detail: `Authentication failed: ${getErrorMessage(error)}` };
    }

    try {
      const { response, price } = await placer.place(order);
      const result = { ...classifyOrderResponse(response), price };
      if (result.outcome === 'error') {
        console.error(`[CLOB] Order for ${userId} rejected: ${result.detail ?? 'unknown reason'}`);
      } else {
        console.log(`[CLOB] Order for ${userId} ${result.outcome}${result.orderId ? `: orderID=${result.orderId}` : ''}`);
      }
      return result;
    } catch (error: unknown) {
      const result = classifyOrderError(error);
      console.error(`[CLOB] Order for ${userId} failed (${result.outcome}): ${result.detail ?? 'unknown reason'}`);
      return result;
    }
  }

  private getPlacer(userId: string): Promise<FokOrderPlacer> {
    const cached = this.placers.get(userId);
    if (cached) return cached;

    const pending = (async () => {
      const signer = await this.signers.getSigner(this.lookupWallet(userId));
      return this.createPlacer(signer);
    })();
    this.placers.set(userId, pending);
    pending.catch(() => {
      if (this.placers.get(userId) === pending) {
        this.placers.delete(userId);
      }
    });
    return pending;
  }
}
