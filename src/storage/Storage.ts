import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import type { PoolStateData } from '../pool/LiquidityPool.js';
import type { SwapRecordJSON } from '../pool/SwapHistory.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Storage');

export interface PoolSnapshotFile {
    version: 1;
    savedAt: number;
    pool: PoolStateData;
    balances: {
        A: Record<string, string>;
        B: Record<string, string>;
    };
    swaps: SwapRecordJSON[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
    return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isPoolState(value: unknown): value is PoolStateData {
    if (!isRecord(value)) return false;
    return typeof value.assetA === 'string'
        && typeof value.assetB === 'string'
        && typeof value.initialized === 'boolean'
        && typeof value.reserveA === 'string'
        && typeof value.reserveB === 'string'
        && typeof value.constantProduct === 'string'
        && typeof value.totalShares === 'string'
        && isStringMap(value.positions)
        && typeof value.createdAt === 'number'
        && typeof value.lastUpdateAt === 'number';
}

function isSwapRecord(value: unknown): value is SwapRecordJSON {
    if (!isRecord(value)) return false;
    return typeof value.party === 'string'
        && typeof value.assetIn === 'string'
        && typeof value.amountIn === 'string'
        && typeof value.assetOut === 'string'
        && typeof value.amountOut === 'string'
        && typeof value.newReserveA === 'string'
        && typeof value.newReserveB === 'string'
        && typeof value.timestamp === 'number';
}

export function isPoolSnapshotFile(value: unknown): value is PoolSnapshotFile {
    if (!isRecord(value) || value.version !== 1 || typeof value.savedAt !== 'number') return false;
    if (!isPoolState(value.pool)) return false;
    if (!isRecord(value.balances) || !isStringMap(value.balances.A) || !isStringMap(value.balances.B)) return false;
    return Array.isArray(value.swaps) && value.swaps.every(isSwapRecord);
}

/**
 * JSON file holding one pool, its asset balances and recent swaps.
 * Bigints are written as decimal strings.
 */
export class PoolStore {
    private dataDir: string;
    private poolPath: string;

    constructor(dataDir: string = config.storage.dataDir, fileName: string = config.storage.poolFile) {
        this.dataDir = dataDir;
        this.poolPath = path.join(dataDir, fileName);
    }

    getPath(): string {
        return this.poolPath;
    }

    private ensureDirectory(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    save(snapshot: PoolSnapshotFile): void {
        this.ensureDirectory();
        // Write beside the target and rename so a crash never leaves half a file
        const tmpPath = `${this.poolPath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2));
        fs.renameSync(tmpPath, this.poolPath);
        log.debug(`💾 Pool saved to ${this.poolPath}`);
    }

    /**
     * null when nothing has been saved yet. A file that exists but cannot
     * be parsed is an error, not an empty pool.
     */
    load(): PoolSnapshotFile | null {
        if (!fs.existsSync(this.poolPath)) {
            return null;
        }
        const content = fs.readFileSync(this.poolPath, 'utf-8');
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new Error(`Pool file ${this.poolPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
        if (!isPoolSnapshotFile(parsed)) {
            throw new Error(`Pool file ${this.poolPath} has an unexpected shape`);
        }
        return parsed;
    }

    clear(): boolean {
        if (fs.existsSync(this.poolPath)) {
            fs.unlinkSync(this.poolPath);
            return true;
        }
        return false;
    }
}
