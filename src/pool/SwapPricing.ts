/**
 * Constant-product swap quotes.
 *
 * amountOut = reserveOut - floor(k / (reserveIn + amountIn)), with k taken
 * from the reserves before this swap. The division floors, so k after a
 * swap is generally not equal to k before it; the ledger recomputes k from
 * the new reserves on commit.
 */

import { SafeMath } from '../security/transaction-guard.js';
import { PoolError, requirePositive } from './errors.js';
import type { ReserveSnapshot } from './ReserveLedger.js';

export type SwapDirection = 'AtoB' | 'BtoA';

export interface SwapQuote {
    direction: SwapDirection;
    amountIn: bigint;
    amountOut: bigint;
    reserveInAfter: bigint;
    reserveOutAfter: bigint;
    /** Reserves the ledger will hold if this quote is committed */
    newReserveA: bigint;
    newReserveB: bigint;
}

function price(reserveIn: bigint, reserveOut: bigint, constantProduct: bigint, amountIn: bigint): bigint {
    const reserveInAfter = SafeMath.add(reserveIn, amountIn);
    if (reserveInAfter === 0n) {
        throw new PoolError('PoolDrainage', 'Pool holds no input reserve to price against');
    }
    let amountOut = reserveOut - constantProduct / reserveInAfter;

    // Anti-drain: never hand out the whole opposite reserve
    if (amountOut === reserveOut) {
        amountOut -= 1n;
    }
    if (amountOut < 0n || amountOut >= reserveOut) {
        throw new PoolError(
            'PoolDrainage',
            `Swap would drain the output reserve (${reserveOut})`,
            { amountIn, reserveOut }
        );
    }
    return amountOut;
}

export function quoteSwap(reserves: ReserveSnapshot, direction: SwapDirection, amountIn: bigint): SwapQuote {
    requirePositive(amountIn, 'amountIn');
    const { reserveA, reserveB, constantProduct } = reserves;
    const reserveIn = direction === 'AtoB' ? reserveA : reserveB;
    const reserveOut = direction === 'AtoB' ? reserveB : reserveA;

    const amountOut = price(reserveIn, reserveOut, constantProduct, amountIn);
    const reserveInAfter = reserveIn + amountIn;
    const reserveOutAfter = reserveOut - amountOut;

    return {
        direction,
        amountIn,
        amountOut,
        reserveInAfter,
        reserveOutAfter,
        newReserveA: direction === 'AtoB' ? reserveInAfter : reserveOutAfter,
        newReserveB: direction === 'AtoB' ? reserveOutAfter : reserveInAfter,
    };
}

export function quoteAtoB(reserves: ReserveSnapshot, amountIn: bigint): bigint {
    return quoteSwap(reserves, 'AtoB', amountIn).amountOut;
}

export function quoteBtoA(reserves: ReserveSnapshot, amountIn: bigint): bigint {
    return quoteSwap(reserves, 'BtoA', amountIn).amountOut;
}

/**
 * Amount of the other asset matching the current reserve ratio (floor).
 */
export function matchingDeposit(reserves: ReserveSnapshot, side: 'A' | 'B', amount: bigint): bigint {
    requirePositive(amount, 'amount');
    if (reserves.reserveA === 0n || reserves.reserveB === 0n) {
        throw new PoolError('PoolNotInitialized', 'Pool has no reserves to derive a ratio from');
    }
    return side === 'A'
        ? SafeMath.div(SafeMath.mul(reserves.reserveB, amount), reserves.reserveA)
        : SafeMath.div(SafeMath.mul(reserves.reserveA, amount), reserves.reserveB);
}
