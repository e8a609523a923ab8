/**
 * Input Validator
 * Parses amounts and party ids coming from the API and CLI
 */

import type { AssetSide } from '../pool/LiquidityPool.js';

const MAX_PARTY_LENGTH = 64;
const PARTY_REGEX = /^[A-Za-z0-9_.:-]+$/;
const UINT_REGEX = /^[0-9]+$/;
// 78 digits covers the full unsigned 256-bit range
const MAX_AMOUNT_DIGITS = 78;

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; error: string };


export function validateParty(party: unknown, fieldName: string = 'party'): ValidationResult<string> {
    if (typeof party !== 'string' || party.length === 0) {
        return { valid: false, error: `${fieldName} must be a non-empty string` };
    }
    if (party.length > MAX_PARTY_LENGTH) {
        return { valid: false, error: `${fieldName} too long (max ${MAX_PARTY_LENGTH})` };
    }
    if (!PARTY_REGEX.test(party)) {
        return { valid: false, error: `${fieldName} contains invalid characters` };
    }
    return { valid: true, value: party };
}

/**
 * Amounts travel as decimal strings so they survive JSON without
 * losing precision. Plain safe integers are accepted too.
 */
export function parseAmount(amount: unknown, fieldName: string = 'amount'): ValidationResult<bigint> {
    let text: string;
    if (typeof amount === 'string') {
        text = amount.trim();
    } else if (typeof amount === 'number' && Number.isSafeInteger(amount)) {
        text = String(amount);
    } else {
        return { valid: false, error: `${fieldName} must be an integer string` };
    }

    if (!UINT_REGEX.test(text)) {
        return { valid: false, error: `${fieldName} must be a non-negative integer` };
    }
    if (text.length > MAX_AMOUNT_DIGITS) {
        return { valid: false, error: `${fieldName} too large` };
    }
    return { valid: true, value: BigInt(text) };
}

/**
 * parseAmount for stored data: throws instead of returning a result.
 */
export function requireAmount(amount: unknown, fieldName: string): bigint {
    const result = parseAmount(amount, fieldName);
    if (!result.valid) {
        throw new Error(result.error);
    }
    return result.value;
}

export function parseAssetSide(asset: unknown, fieldName: string = 'asset'): ValidationResult<AssetSide> {
    const side = typeof asset === 'string' ? asset.trim().toUpperCase() : '';
    if (side === 'A' || side === 'B') {
        return { valid: true, value: side };
    }
    return { valid: false, error: `${fieldName} must be A or B` };
}
