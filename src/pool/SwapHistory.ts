/**
 * Swap History
 * Keeps the most recent swap records and writes one log line per swap.
 */

import { requireAmount } from '../security/input-validator.js';
import { logger } from '../utils/logger.js';

export interface SwapRecord {
    party: string;
    assetIn: string;
    amountIn: bigint;
    assetOut: string;
    amountOut: bigint;
    newReserveA: bigint;
    newReserveB: bigint;
    timestamp: number;
}

export type SwapRecordJSON = {
    [K in keyof SwapRecord]: SwapRecord[K] extends bigint ? string : SwapRecord[K];
};

export type SwapListener = (record: SwapRecord) => void;

export class SwapHistory {
    private records: SwapRecord[] = [];
    private readonly limit: number;
    private log = logger.child('Swaps');

    constructor(limit: number = 1000) {
        if (!Number.isInteger(limit) || limit <= 0) {
            throw new Error('Swap history limit must be a positive integer');
        }
        this.limit = limit;
    }

    record(swap: SwapRecord): void {
        this.records.push(swap);
        if (this.records.length > this.limit) {
            this.records = this.records.slice(-this.limit);
        }
        this.log.info(
            `💱 ${swap.party}: ${swap.amountIn} ${swap.assetIn} → ${swap.amountOut} ${swap.assetOut} ` +
            `(reserves ${swap.newReserveA} / ${swap.newReserveB})`
        );
    }

    /** Listener to hand to the pool */
    listener(): SwapListener {
        return (swap) => this.record(swap);
    }

    /** Newest first */
    recent(count: number = this.limit): SwapRecord[] {
        if (count <= 0) return [];
        return this.records.slice(-count).reverse();
    }

    size(): number {
        return this.records.length;
    }

    toJSON(): SwapRecordJSON[] {
        return this.records.map((r) => ({
            ...r,
            amountIn: r.amountIn.toString(),
            amountOut: r.amountOut.toString(),
            newReserveA: r.newReserveA.toString(),
            newReserveB: r.newReserveB.toString(),
        }));
    }

    static parseRecords(data: SwapRecordJSON[]): SwapRecord[] {
        return data.map((r, i) => ({
            ...r,
            amountIn: requireAmount(r.amountIn, `swaps[${i}].amountIn`),
            amountOut: requireAmount(r.amountOut, `swaps[${i}].amountOut`),
            newReserveA: requireAmount(r.newReserveA, `swaps[${i}].newReserveA`),
            newReserveB: requireAmount(r.newReserveB, `swaps[${i}].newReserveB`),
        }));
    }

    load(records: SwapRecord[]): void {
        this.records = records.slice(-this.limit);
    }
}
