import { SafeMath } from '../security/transaction-guard.js';

export interface ReserveSnapshot {
    readonly reserveA: bigint;
    readonly reserveB: bigint;
    readonly constantProduct: bigint;
}

const EMPTY: ReserveSnapshot = Object.freeze({ reserveA: 0n, reserveB: 0n, constantProduct: 0n });

/**
 * Holds the two reserves and k = reserveA * reserveB.
 *
 * The whole snapshot is swapped in one assignment, so a reader never sees
 * new reserves next to a stale product. No policy checks live here.
 */
export class ReserveLedger {
    private current: ReserveSnapshot = EMPTY;

    get reserveA(): bigint {
        return this.current.reserveA;
    }

    get reserveB(): bigint {
        return this.current.reserveB;
    }

    get constantProduct(): bigint {
        return this.current.constantProduct;
    }

    snapshot(): ReserveSnapshot {
        return this.current;
    }

    /**
     * Computes the product before touching state, so an Overflow leaves
     * the previous snapshot in place.
     */
    static project(reserveA: bigint, reserveB: bigint): ReserveSnapshot {
        const constantProduct = SafeMath.mul(reserveA, reserveB);
        return Object.freeze({ reserveA, reserveB, constantProduct });
    }

    commit(reserveA: bigint, reserveB: bigint): ReserveSnapshot {
        const next = ReserveLedger.project(reserveA, reserveB);
        this.current = next;
        return next;
    }
}
