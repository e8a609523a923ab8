import { SEED_SHARES } from '../config.js';
import { SafeMath } from '../security/transaction-guard.js';
import { PoolError } from './errors.js';
import type { ReserveSnapshot } from './ReserveLedger.js';

export type PoolStatus = 'Uninitialized' | 'Active' | 'Drained';

export interface DepositPlan {
    minted: bigint;
    seeded: boolean;
}

export interface WithdrawPlan {
    amountA: bigint;
    amountB: bigint;
}

export interface AccountingOptions {
    /** Deposit share figures must agree after division by this */
    ratioTolerance: bigint;
    /** Whether an emptied pool accepts a new seed deposit */
    allowReseed: boolean;
}

/**
 * Share issuance and redemption. Totals and positions change only through
 * mint() and burn(), which the coordinator calls after transfers succeed.
 */
export class LiquidityAccounting {
    private totalShares: bigint = 0n;
    private positions: Map<string, bigint> = new Map();
    private initialized = false;
    private readonly options: AccountingOptions;

    constructor(options: AccountingOptions) {
        if (options.ratioTolerance <= 0n) {
            throw new Error('ratioTolerance must be positive');
        }
        this.options = options;
    }

    getTotalShares(): bigint {
        return this.totalShares;
    }

    sharesOf(party: string): bigint {
        return this.positions.get(party) ?? 0n;
    }

    providerCount(): number {
        return this.positions.size;
    }

    getPositions(): ReadonlyMap<string, bigint> {
        return this.positions;
    }

    status(): PoolStatus {
        if (this.totalShares > 0n) return 'Active';
        return this.initialized ? 'Drained' : 'Uninitialized';
    }

    // ========== DEPOSIT ==========

    sharesForDeposit(reserves: ReserveSnapshot, amountA: bigint, amountB: bigint): DepositPlan {
        if (this.totalShares === 0n) {
            if (this.initialized && !this.options.allowReseed) {
                throw new PoolError('PoolDrained', 'Pool has been fully withdrawn and does not accept a new seed deposit');
            }
            return { minted: SEED_SHARES, seeded: true };
        }

        const sharesA = SafeMath.div(SafeMath.mul(this.totalShares, amountA), reserves.reserveA);
        const sharesB = SafeMath.div(SafeMath.mul(this.totalShares, amountB), reserves.reserveB);

        // Coarse check: tolerates integer-division noise, not an exact ratio proof
        const tolerance = this.options.ratioTolerance;
        if (sharesA / tolerance !== sharesB / tolerance) {
            throw new PoolError(
                'RatioMismatch',
                `Deposit ratio does not match reserves (${reserves.reserveA}:${reserves.reserveB})`,
                { sharesA, sharesB }
            );
        }

        return { minted: sharesA, seeded: false };
    }

    // ========== WITHDRAW ==========

    amountsForWithdraw(reserves: ReserveSnapshot, shares: bigint): WithdrawPlan {
        if (shares > this.totalShares) {
            throw new PoolError(
                'InsufficientPoolShares',
                `Requested ${shares} shares but only ${this.totalShares} exist`,
                { shares, totalShares: this.totalShares }
            );
        }
        if (this.totalShares === 0n) {
            throw new PoolError('PoolNotInitialized', 'Pool holds no liquidity');
        }

        return {
            amountA: SafeMath.div(SafeMath.mul(shares, reserves.reserveA), this.totalShares),
            amountB: SafeMath.div(SafeMath.mul(shares, reserves.reserveB), this.totalShares),
        };
    }

    requireOwned(party: string, shares: bigint): void {
        const owned = this.sharesOf(party);
        if (shares > owned) {
            throw new PoolError(
                'InsufficientOwnedShares',
                `Requested ${shares} shares but ${party} owns ${owned}`,
                { shares, owned }
            );
        }
    }

    // ========== MUTATIONS ==========

    mint(party: string, shares: bigint): void {
        const total = SafeMath.add(this.totalShares, shares);
        const position = SafeMath.add(this.sharesOf(party), shares);
        this.totalShares = total;
        this.positions.set(party, position);
        this.initialized = true;
    }

    burn(party: string, shares: bigint): void {
        const position = SafeMath.sub(this.sharesOf(party), shares);
        const total = SafeMath.sub(this.totalShares, shares);
        this.totalShares = total;
        if (position === 0n) {
            this.positions.delete(party);
        } else {
            this.positions.set(party, position);
        }
    }

    // ========== PERSISTENCE ==========

    load(totalShares: bigint, positions: Map<string, bigint>, initialized: boolean): void {
        this.totalShares = totalShares;
        this.positions = new Map(positions);
        this.initialized = initialized || totalShares > 0n;
    }

    isInitialized(): boolean {
        return this.initialized;
    }
}
