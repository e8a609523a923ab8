/**
 * Pool failures. Every kind is scoped to the single rejected operation;
 * a thrown PoolError means the pool state was not touched.
 */

export type PoolErrorKind =
    | 'TransferFailed'
    | 'RatioMismatch'
    | 'PoolDrainage'
    | 'InsufficientPoolShares'
    | 'InsufficientOwnedShares'
    | 'Overflow'
    | 'InvalidAmount'
    | 'PoolNotInitialized'
    | 'PoolDrained'
    | 'ReservedParty';

export class PoolError extends Error {
    readonly kind: PoolErrorKind;
    readonly details: Record<string, string>;

    constructor(kind: PoolErrorKind, message: string, details: Record<string, string | bigint> = {}) {
        super(message);
        this.name = 'PoolError';
        this.kind = kind;
        this.details = Object.fromEntries(
            Object.entries(details).map(([key, value]) => [key, value.toString()])
        );
    }

    toJSON(): { kind: PoolErrorKind; message: string; details: Record<string, string> } {
        return { kind: this.kind, message: this.message, details: this.details };
    }
}

export function requirePositive(amount: bigint, field: string): void {
    if (amount <= 0n) {
        throw new PoolError('InvalidAmount', `${field} must be greater than zero`, { [field]: amount });
    }
}

export function isPoolError(error: unknown, kind?: PoolErrorKind): error is PoolError {
    return error instanceof PoolError && (kind === undefined || error.kind === kind);
}
