import { logger } from '../utils/logger.js';
import { PoolError } from '../pool/errors.js';

const log = logger.child('TxGuard');

// Reserves, products and share counts must fit an unsigned 256-bit word
export const MAX_UINT256 = (1n << 256n) - 1n;

function checked(result: bigint, op: string): bigint {
    if (result > MAX_UINT256) {
        throw new PoolError('Overflow', `Overflow in ${op}`, { op });
    }
    if (result < 0n) {
        throw new PoolError('Overflow', `Underflow in ${op}`, { op });
    }
    return result;
}

export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        return checked(a + b, 'add');
    },
    sub(a: bigint, b: bigint): bigint {
        return checked(a - b, 'sub');
    },
    mul(a: bigint, b: bigint): bigint {
        return checked(a * b, 'mul');
    },
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new PoolError('Overflow', 'Division by zero', { op: 'div' });
        return checked(a / b, 'div');
    },
};

/**
 * FIFO async lock. Holders run strictly one after another, including
 * across awaits inside the critical section.
 */
export class PoolLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    async run<T>(label: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });

        this.pending++;
        if (this.pending > 1) {
            log.debug(`🔒 ${label} waiting (${this.pending - 1} ahead)`);
        }

        await previous;
        try {
            return await fn();
        } finally {
            this.pending--;
            release();
        }
    }

    isLocked(): boolean {
        return this.pending > 0;
    }
}
