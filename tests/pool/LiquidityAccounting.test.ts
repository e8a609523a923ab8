import { describe, it, expect } from 'vitest';
import { PRECISION, SEED_SHARES } from '../../src/config.js';
import { LiquidityAccounting } from '../../src/pool/LiquidityAccounting.js';
import { ReserveLedger } from '../../src/pool/ReserveLedger.js';
import { thrownBy } from '../helpers.js';

const EMPTY = ReserveLedger.project(0n, 0n);

function seeded(reserveA: bigint, reserveB: bigint, options = { ratioTolerance: 1000n, allowReseed: true }) {
    const accounting = new LiquidityAccounting(options);
    accounting.mint('alice', SEED_SHARES);
    return { accounting, reserves: ReserveLedger.project(reserveA, reserveB) };
}

describe('Deposit shares', () => {
    it('seeds an empty pool with 100 * PRECISION regardless of amounts', () => {
        const accounting = new LiquidityAccounting({ ratioTolerance: 1000n, allowReseed: true });
        expect(accounting.sharesForDeposit(EMPTY, 1000n, 2000n)).toEqual({ minted: 100n * PRECISION, seeded: true });
        expect(accounting.sharesForDeposit(EMPTY, 1n, 999_999n).minted).toBe(SEED_SHARES);
    });

    it('mints proportionally to the existing reserves', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        expect(accounting.sharesForDeposit(reserves, 100n, 200n)).toEqual({ minted: 10n * PRECISION, seeded: false });
    });

    it('rejects a deposit off the reserve ratio', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        const error = thrownBy(() => accounting.sharesForDeposit(reserves, 100n, 150n));
        expect(error.kind).toBe('RatioMismatch');
        expect(error.details).toEqual({ sharesA: '10000000000000000000', sharesB: '7500000000000000000' });
    });

    it('uses the configured tolerance divisor', () => {
        const strict = seeded(1000n, 2000n);
        expect(thrownBy(() => strict.accounting.sharesForDeposit(strict.reserves, 100n, 201n)).kind).toBe('RatioMismatch');

        // One whole share of slack: 10.05e18 and 10e18 agree
        const loose = seeded(1000n, 2000n, { ratioTolerance: PRECISION, allowReseed: true });
        expect(loose.accounting.sharesForDeposit(loose.reserves, 100n, 201n).minted).toBe(10n * PRECISION);
    });

    it('refuses a zero tolerance divisor', () => {
        expect(() => new LiquidityAccounting({ ratioTolerance: 0n, allowReseed: true })).toThrow('ratioTolerance must be positive');
    });
});

describe('Withdraw amounts', () => {
    it('returns a proportional slice of both reserves', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        expect(accounting.amountsForWithdraw(reserves, 10n * PRECISION)).toEqual({ amountA: 100n, amountB: 200n });
    });

    it('floors the amounts so dust stays in the pool', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        expect(accounting.amountsForWithdraw(reserves, 1n)).toEqual({ amountA: 0n, amountB: 0n });
        expect(accounting.amountsForWithdraw(reserves, 333n * 10n ** 15n)).toEqual({ amountA: 3n, amountB: 6n });
    });

    it('returns the full reserves for all shares', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        expect(accounting.amountsForWithdraw(reserves, SEED_SHARES)).toEqual({ amountA: 1000n, amountB: 2000n });
    });

    it('rejects more shares than exist', () => {
        const { accounting, reserves } = seeded(1000n, 2000n);
        expect(thrownBy(() => accounting.amountsForWithdraw(reserves, SEED_SHARES + 1n)).kind).toBe('InsufficientPoolShares');
    });

    it('rejects more shares than the party owns', () => {
        const { accounting } = seeded(1000n, 2000n);
        expect(thrownBy(() => accounting.requireOwned('bob', 1n)).kind).toBe('InsufficientOwnedShares');
        expect(() => accounting.requireOwned('alice', SEED_SHARES)).not.toThrow();
    });
});

describe('Positions and status', () => {
    it('tracks mint and burn per party', () => {
        const { accounting } = seeded(1000n, 2000n);
        accounting.mint('bob', 5n);
        expect(accounting.getTotalShares()).toBe(SEED_SHARES + 5n);
        expect(accounting.providerCount()).toBe(2);

        accounting.burn('bob', 5n);
        expect(accounting.sharesOf('bob')).toBe(0n);
        expect(accounting.providerCount()).toBe(1);
    });

    it('moves from Uninitialized to Active to Drained', () => {
        const accounting = new LiquidityAccounting({ ratioTolerance: 1000n, allowReseed: true });
        expect(accounting.status()).toBe('Uninitialized');
        accounting.mint('alice', SEED_SHARES);
        expect(accounting.status()).toBe('Active');
        accounting.burn('alice', SEED_SHARES);
        expect(accounting.status()).toBe('Drained');
    });

    it('re-seeds a drained pool when allowed', () => {
        const { accounting } = seeded(1000n, 2000n);
        accounting.burn('alice', SEED_SHARES);
        expect(accounting.sharesForDeposit(EMPTY, 7n, 3n)).toEqual({ minted: SEED_SHARES, seeded: true });
    });

    it('refuses to re-seed a drained pool when re-seeding is off', () => {
        const { accounting } = seeded(1000n, 2000n, { ratioTolerance: 1000n, allowReseed: false });
        accounting.burn('alice', SEED_SHARES);
        expect(thrownBy(() => accounting.sharesForDeposit(EMPTY, 7n, 3n)).kind).toBe('PoolDrained');
    });
});
