import 'dotenv/config';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// Share amounts are scaled by this factor
export const PRECISION = 10n ** 18n;

// Issued to the first depositor of an empty pool, whatever the amounts
export const SEED_SHARES = 100n * PRECISION;

function readString(name: string, fallback: string): string {
    const value = process.env[name];
    return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function readBigInt(name: string, fallback: bigint): bigint {
    const raw = readString(name, fallback.toString());
    if (!/^[0-9]+$/.test(raw)) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw);
}

function readInt(name: string, fallback: number): number {
    const raw = readString(name, String(fallback));
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
    const raw = readString(name, String(fallback)).toLowerCase();
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    throw new Error(`${name} must be true or false, got "${raw}"`);
}

function readLogLevel(): LogLevel {
    const raw = readString('LOG_LEVEL', 'info').toLowerCase();
    if (!isLogLevel(raw)) {
        throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
    }
    return raw;
}

const ratioTolerance = readBigInt('POOL_RATIO_TOLERANCE', 1000n);
if (ratioTolerance === 0n) {
    throw new Error('POOL_RATIO_TOLERANCE must be greater than zero');
}

const assetA = readString('POOL_ASSET_A', 'TKA');
const assetB = readString('POOL_ASSET_B', 'TKB');
if (assetA === assetB) {
    throw new Error(`POOL_ASSET_A and POOL_ASSET_B must differ, both are "${assetA}"`);
}

export const config = {
    version: '1.0.0',
    pool: {
        assetA,
        assetB,
        // Party id under which the pool holds its reserves
        account: readString('POOL_ACCOUNT', 'pool'),
        // Deposits pass when both share figures agree after dividing by this
        ratioTolerance,
        allowReseed: readBoolean('POOL_ALLOW_RESEED', true),
        swapHistoryLimit: readInt('POOL_SWAP_HISTORY', 1000),
    },
    api: {
        port: readInt('API_PORT', 3001),
        cors: {
            origin: '*',
        },
        rateLimit: {
            windowMs: 60000,
            maxRequests: 100,
        },
    },
    storage: {
        dataDir: readString('DATA_DIR', './data'),
        poolFile: 'pool.json',
    },
    logLevel: readLogLevel(),
};
