import { PoolError } from '../src/pool/errors.js';
import { InMemoryAsset, type AssetTransfer } from '../src/pool/InMemoryAsset.js';

export const NOW = 1_700_000_000_000;

export async function rejectionOf(promise: Promise<unknown>): Promise<PoolError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof PoolError) return error;
        throw error;
    }
    throw new Error('Expected the operation to be rejected');
}

export function thrownBy(fn: () => unknown): PoolError {
    try {
        fn();
    } catch (error) {
        if (error instanceof PoolError) return error;
        throw error;
    }
    throw new Error('Expected the call to throw');
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps an in-memory asset so tests can make transfers fail, throw,
 * or resolve later.
 */
export class ControlledAsset implements AssetTransfer {
    readonly symbol: string;
    readonly inner: InMemoryAsset;
    failTransfer: 'no' | 'false' | 'throw' = 'no';
    failTransferFrom: 'no' | 'false' | 'throw' = 'no';
    latencyMs = 0;
    calls: string[] = [];

    constructor(symbol: string, custodian: string) {
        this.symbol = symbol;
        this.inner = new InMemoryAsset(symbol, custodian);
    }

    async transferFrom(from: string, to: string, amount: bigint): Promise<boolean> {
        this.calls.push(`transferFrom:${from}:${to}:${amount}`);
        if (this.latencyMs > 0) await delay(this.latencyMs);
        if (this.failTransferFrom === 'throw') throw new Error('asset unavailable');
        if (this.failTransferFrom === 'false') return false;
        return this.inner.transferFrom(from, to, amount);
    }

    async transfer(to: string, amount: bigint): Promise<boolean> {
        this.calls.push(`transfer:${to}:${amount}`);
        if (this.latencyMs > 0) await delay(this.latencyMs);
        if (this.failTransfer === 'throw') throw new Error('asset unavailable');
        if (this.failTransfer === 'false') return false;
        return this.inner.transfer(to, amount);
    }
}

/** Deterministic pseudo-random sequence (LCG) */
export function sequence(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}
