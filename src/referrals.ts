import { randomInt } from 'crypto';

/**
 * Referral and points rules
 *
 * - Own trades: 1 point per $1 of volume
 * - Referred user's trades: 0.1 point per $1 of their volume, to the referrer
 * - Referral signup: 100 points to the referrer, once per new user
 *
 * Amounts are handled in hundredths so the ledger sums stay exact.
 */

export const REFERRAL_CODE_LENGTH = 7;
export const CUSTOM_CODE_MIN_LENGTH = 3;
export const CUSTOM_CODE_MAX_LENGTH = 7;
export const MAX_REFERRAL_CODE_ATTEMPTS = 10;

export const TRADE_POINTS_PER_USD = 1;
export const REFERRAL_TRADE_RATE = 0.1;
export const REFERRAL_SIGNUP_BONUS = 100;

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const CODE_PATTERN = /^[A-Za-z0-9]+$/;

export type ReferralCodeGenerator = () => string;

export const generateReferralCode: ReferralCodeGenerator = () => {
  let code = '';
  for (let i = 0; i < REFERRAL_CODE_LENGTH; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
};

export function normalizeReferralCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * 3-7 alphanumeric characters, case insensitive
 */
export function isValidReferralCode(code: string | null | undefined): boolean {
  if (!code) return false;
  const trimmed = code.trim();
  return trimmed.length >= CUSTOM_CODE_MIN_LENGTH
    && trimmed.length <= CUSTOM_CODE_MAX_LENGTH
    && CODE_PATTERN.test(trimmed);
}

export function toHundredths(amount: number): number {
  return Math.round(amount * 100);
}

export function fromHundredths(hundredths: number): number {
  return hundredths / 100;
}

export function calculateTradePoints(volumeUsd: number): number {
  return fromHundredths(toHundredths(volumeUsd) * TRADE_POINTS_PER_USD);
}

export function calculateReferralTradePoints(volumeUsd: number): number {
  return fromHundredths(Math.round(toHundredths(volumeUsd) * REFERRAL_TRADE_RATE));
}

export function referralSignupBonus(): number {
  return REFERRAL_SIGNUP_BONUS;
}
