import { describe, it, expect, beforeEach } from 'vitest';
import { PRECISION, SEED_SHARES } from '../../src/config.js';
import { PoolError } from '../../src/pool/errors.js';
import { LiquidityPool } from '../../src/pool/LiquidityPool.js';
import { PoolModule } from '../../src/pool/poolModule.js';
import { ControlledAsset, NOW, delay, rejectionOf, sequence, thrownBy } from '../helpers.js';

function createModule(allowReseed = true): PoolModule {
    return new PoolModule({ assetA: 'TKA', assetB: 'TKB', account: 'pool', allowReseed, clock: () => NOW });
}

function fund(mod: PoolModule, party: string, amountA: bigint, amountB: bigint): void {
    if (amountA > 0n) mod.faucet(party, 'A', amountA);
    if (amountB > 0n) mod.faucet(party, 'B', amountB);
}

/** Pool over controllable assets, seeded by alice at 1000 / 1000 */
async function controlledPool(onSwap?: () => void) {
    const a = new ControlledAsset('TKA', 'pool');
    const b = new ControlledAsset('TKB', 'pool');
    const pool = new LiquidityPool({ assetA: a, assetB: b, account: 'pool', ratioTolerance: 1000n, allowReseed: true, onSwap });
    a.inner.mint('alice', 10_000n);
    b.inner.mint('alice', 10_000n);
    a.inner.mint('bob', 10_000n);
    b.inner.mint('bob', 10_000n);
    await pool.addLiquidity('alice', 1000n, 1000n);
    a.calls = [];
    b.calls = [];
    return { pool, a, b };
}

describe('LiquidityPool deposits', () => {
    let mod: PoolModule;

    beforeEach(() => {
        mod = createModule();
        fund(mod, 'alice', 10_000n, 3000n);
        fund(mod, 'bob', 1000n, 1000n);
    });

    it('seeds an empty pool', async () => {
        const minted = await mod.pool.addLiquidity('alice', 1000n, 2000n);

        expect(minted).toBe(SEED_SHARES);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 1000n, reserveB: 2000n, constantProduct: 2_000_000n });
        expect(mod.pool.sharesOf('alice')).toBe(100n * PRECISION);
        expect(mod.assetA.balanceOf('alice')).toBe(9000n);
        expect(mod.assetB.balanceOf('alice')).toBe(1000n);
        expect(mod.assetA.balanceOf('pool')).toBe(1000n);
        expect(mod.assetB.balanceOf('pool')).toBe(2000n);
        expect(mod.pool.status()).toBe('Active');
        expect(mod.pool.getPoolInfo().createdAt).toBe(NOW);
    });

    it('mints proportional shares for a matching deposit', async () => {
        await mod.pool.addLiquidity('alice', 1000n, 2000n);
        const result = await mod.pool.deposit('bob', 100n, 200n);

        expect(result).toEqual({ minted: 10n * PRECISION, seeded: false, amountA: 100n, amountB: 200n });
        expect(mod.pool.getTotalShares()).toBe(110n * PRECISION);
        expect(mod.pool.getReserves().constantProduct).toBe(1100n * 2200n);
    });

    it('rejects an off-ratio deposit without moving anything', async () => {
        await mod.pool.addLiquidity('alice', 1000n, 2000n);
        const error = await rejectionOf(mod.pool.addLiquidity('bob', 100n, 150n));

        expect(error.kind).toBe('RatioMismatch');
        expect(mod.pool.getReserves().reserveA).toBe(1000n);
        expect(mod.pool.getTotalShares()).toBe(SEED_SHARES);
        expect(mod.assetA.balanceOf('bob')).toBe(1000n);
        expect(mod.assetB.balanceOf('bob')).toBe(1000n);
    });

    it('rejects zero amounts', async () => {
        const error = await rejectionOf(mod.pool.addLiquidity('alice', 0n, 10n));
        expect(error.kind).toBe('InvalidAmount');
        expect(error.details).toEqual({ amountA: '0' });
        expect(mod.pool.status()).toBe('Uninitialized');
    });

    it('refunds the first asset when the second transfer fails', async () => {
        await mod.pool.addLiquidity('alice', 1000n, 2000n);
        mod.faucet('carol', 'A', 100n);

        const error = await rejectionOf(mod.pool.addLiquidity('carol', 100n, 200n));
        expect(error.kind).toBe('TransferFailed');
        expect(error.details).toEqual({ asset: 'TKB', direction: 'in', amount: '200' });
        expect(mod.assetA.balanceOf('carol')).toBe(100n);
        expect(mod.assetA.balanceOf('pool')).toBe(1000n);
        expect(mod.pool.sharesOf('carol')).toBe(0n);
    });

    it('rejects a deposit whose product would exceed 256 bits', async () => {
        const huge = 1n << 200n;
        fund(mod, 'whale', huge, huge);

        const error = await rejectionOf(mod.pool.addLiquidity('whale', huge, huge));
        expect(error.kind).toBe('Overflow');
        expect(mod.assetA.balanceOf('whale')).toBe(huge);
        expect(mod.pool.getReserves().reserveA).toBe(0n);
        expect(mod.pool.status()).toBe('Uninitialized');
    });
});

describe('LiquidityPool swaps', () => {
    let mod: PoolModule;

    beforeEach(async () => {
        mod = createModule();
        fund(mod, 'alice', 1000n, 1000n);
        fund(mod, 'bob', 10_000n, 10_000n);
        await mod.pool.addLiquidity('alice', 1000n, 1000n);
    });

    it('swaps A for B and records it', async () => {
        const out = await mod.pool.swapTokenA('bob', 100n);

        expect(out).toBe(91n);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 1100n, reserveB: 909n, constantProduct: 999_900n });
        expect(mod.assetA.balanceOf('bob')).toBe(9900n);
        expect(mod.assetB.balanceOf('bob')).toBe(10_091n);
        expect(mod.history.recent(1)).toEqual([{
            party: 'bob',
            assetIn: 'TKA',
            amountIn: 100n,
            assetOut: 'TKB',
            amountOut: 91n,
            newReserveA: 1100n,
            newReserveB: 909n,
            timestamp: NOW,
        }]);
    });

    it('returns more than was paid on an immediate round trip', async () => {
        const out = await mod.pool.swapTokenA('bob', 100n);
        const back = await mod.pool.swapTokenB('bob', out);

        expect(back).toBe(101n);
        expect(mod.assetA.balanceOf('bob')).toBe(10_001n);
        expect(mod.assetB.balanceOf('bob')).toBe(10_000n);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 999n, reserveB: 1000n, constantProduct: 999_000n });
    });

    it('quotes what a swap will pay', async () => {
        expect(mod.pool.calculateTokenASwap(100n)).toBe(91n);
        expect(await mod.pool.swapTokenA('bob', 100n)).toBe(91n);
    });

    it('fails without touching state when the party cannot pay', async () => {
        const error = await rejectionOf(mod.pool.swapTokenA('dave', 100n));

        expect(error.kind).toBe('TransferFailed');
        expect(error.details).toEqual({ asset: 'TKA', direction: 'in', amount: '100' });
        expect(mod.pool.getReserves().reserveA).toBe(1000n);
        expect(mod.history.size()).toBe(0);
    });

    it('keeps one unit of the output reserve for an oversized input', async () => {
        fund(mod, 'whale', 1_000_000_000n, 0n);
        const out = await mod.pool.swapTokenA('whale', 1_000_000_000n);

        expect(out).toBe(999n);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 1_000_001_000n, reserveB: 1n, constantProduct: 1_000_001_000n });
    });

    it('rejects a zero input', async () => {
        expect((await rejectionOf(mod.pool.swapTokenB('bob', 0n))).kind).toBe('InvalidAmount');
    });

    it('refuses the pool account as a trading party', async () => {
        const swap = await rejectionOf(mod.pool.swapTokenA('pool', 900n));
        expect(swap.kind).toBe('ReservedParty');
        expect(swap.details).toEqual({ party: 'pool' });
        expect((await rejectionOf(mod.pool.addLiquidity('pool', 10n, 10n))).kind).toBe('ReservedParty');
        expect((await rejectionOf(mod.pool.removeLiquidity('pool', 1n))).kind).toBe('ReservedParty');

        expect(mod.pool.getReserves()).toEqual({ reserveA: 1000n, reserveB: 1000n, constantProduct: 1_000_000n });
        expect(mod.assetA.balanceOf('pool')).toBe(1000n);
        expect(await mod.pool.removeLiquidity('alice', SEED_SHARES)).toEqual({ amountA: 1000n, amountB: 1000n });
    });

    it('rejects non-positive amounts in quotes', () => {
        expect(thrownBy(() => mod.pool.calculateTokenASwap(-1n)).kind).toBe('InvalidAmount');
        expect(thrownBy(() => mod.pool.calculateTokenBSwap(0n)).kind).toBe('InvalidAmount');
        expect(thrownBy(() => mod.pool.calculateTokenBDeposit(0n)).kind).toBe('InvalidAmount');
        expect(thrownBy(() => mod.pool.calculateWithdrawAmount(0n)).details).toEqual({ shares: '0' });
    });

    it('refuses to swap on an empty pool', async () => {
        const empty = createModule();
        fund(empty, 'bob', 100n, 0n);
        expect((await rejectionOf(empty.pool.swapTokenA('bob', 10n))).kind).toBe('PoolNotInitialized');
        expect(() => empty.pool.calculateTokenASwap(10n)).toThrow(PoolError);
    });
});

describe('LiquidityPool withdrawals', () => {
    let mod: PoolModule;

    beforeEach(async () => {
        mod = createModule();
        fund(mod, 'alice', 1000n, 2000n);
        fund(mod, 'bob', 100n, 200n);
        await mod.pool.addLiquidity('alice', 1000n, 2000n);
        await mod.pool.addLiquidity('bob', 100n, 200n);
    });

    it('pays out a proportional slice', async () => {
        const amounts = await mod.pool.removeLiquidity('bob', 10n * PRECISION);

        expect(amounts).toEqual({ amountA: 100n, amountB: 200n });
        expect(mod.pool.sharesOf('bob')).toBe(0n);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 1000n, reserveB: 2000n, constantProduct: 2_000_000n });
        expect(mod.assetA.balanceOf('bob')).toBe(100n);
        expect(mod.pool.getPoolInfo().providers).toBe(1);
    });

    it('burns dust shares for nothing', async () => {
        const amounts = await mod.pool.removeLiquidity('alice', 1n);
        expect(amounts).toEqual({ amountA: 0n, amountB: 0n });
        expect(mod.pool.sharesOf('alice')).toBe(SEED_SHARES - 1n);
        expect(mod.pool.getReserves().reserveA).toBe(1100n);
    });

    it('rejects shares beyond the position or the pool', async () => {
        expect((await rejectionOf(mod.pool.removeLiquidity('bob', 11n * PRECISION))).kind).toBe('InsufficientOwnedShares');
        expect((await rejectionOf(mod.pool.removeLiquidity('bob', 111n * PRECISION))).kind).toBe('InsufficientPoolShares');
        expect(mod.pool.sharesOf('bob')).toBe(10n * PRECISION);
    });

    it('drains the pool when every share is redeemed, then accepts a new seed', async () => {
        await mod.pool.removeLiquidity('bob', 10n * PRECISION);
        const amounts = await mod.pool.removeLiquidity('alice', SEED_SHARES);

        expect(amounts).toEqual({ amountA: 1000n, amountB: 2000n });
        expect(mod.pool.getTotalShares()).toBe(0n);
        expect(mod.pool.getReserves()).toEqual({ reserveA: 0n, reserveB: 0n, constantProduct: 0n });
        expect(mod.pool.status()).toBe('Drained');

        const result = await mod.pool.deposit('alice', 10n, 30n);
        expect(result).toEqual({ minted: SEED_SHARES, seeded: true, amountA: 10n, amountB: 30n });
        expect(mod.pool.status()).toBe('Active');
    });

    it('refuses a new seed after draining when re-seeding is off', async () => {
        const strict = createModule(false);
        fund(strict, 'alice', 1000n, 1000n);
        await strict.pool.addLiquidity('alice', 500n, 500n);
        await strict.pool.removeLiquidity('alice', SEED_SHARES);

        expect((await rejectionOf(strict.pool.addLiquidity('alice', 500n, 500n))).kind).toBe('PoolDrained');
        expect(strict.pool.status()).toBe('Drained');
    });
});

describe('LiquidityPool transfer failures', () => {
    it('refunds the input when the payout fails', async () => {
        const { pool, a, b } = await controlledPool();
        b.failTransfer = 'false';

        const error = await rejectionOf(pool.swapTokenA('bob', 100n));
        expect(error.kind).toBe('TransferFailed');
        expect(error.details).toEqual({ asset: 'TKB', direction: 'out', amount: '91' });
        expect(a.calls).toEqual(['transferFrom:bob:pool:100', 'transfer:bob:100']);
        expect(a.inner.balanceOf('bob')).toBe(10_000n);
        expect(pool.getReserves()).toEqual({ reserveA: 1000n, reserveB: 1000n, constantProduct: 1_000_000n });
    });

    it('treats a throwing transfer like a refused one', async () => {
        const { pool, a } = await controlledPool();
        a.failTransferFrom = 'throw';

        expect((await rejectionOf(pool.swapTokenA('bob', 100n))).kind).toBe('TransferFailed');
        expect(pool.getReserves().reserveA).toBe(1000n);
    });

    it('reclaims the first payout when the second one fails', async () => {
        const { pool, a, b } = await controlledPool();
        b.failTransfer = 'false';

        const error = await rejectionOf(pool.removeLiquidity('alice', 10n * PRECISION));
        expect(error.details).toEqual({ asset: 'TKB', direction: 'out', amount: '100' });
        expect(a.calls).toEqual(['transfer:alice:100', 'transferFrom:alice:pool:100']);
        expect(a.inner.balanceOf('alice')).toBe(9000n);
        expect(a.inner.balanceOf('pool')).toBe(1000n);
        expect(pool.sharesOf('alice')).toBe(SEED_SHARES);
    });

    it('keeps a committed swap when the listener throws', async () => {
        const { pool } = await controlledPool(() => {
            throw new Error('listener broke');
        });
        expect(await pool.swapTokenA('bob', 100n)).toBe(91n);
        expect(pool.getReserves().reserveA).toBe(1100n);
    });
});

describe('LiquidityPool concurrency', () => {
    it('runs overlapping swaps one after another', async () => {
        const { pool, a, b } = await controlledPool();
        a.latencyMs = 5;
        b.latencyMs = 5;

        const first = pool.swapTokenA('bob', 100n);
        const second = pool.swapTokenA('alice', 100n);
        await delay(1);

        expect(pool.isBusy()).toBe(true);
        expect(pool.getReserves().reserveA).toBe(1000n);

        // floor(999_900 / 1200) = 833, so the second swap gets 909 - 833
        expect(await Promise.all([first, second])).toEqual([91n, 76n]);
        expect(pool.isBusy()).toBe(false);
        expect(pool.getReserves()).toEqual({ reserveA: 1200n, reserveB: 833n, constantProduct: 999_600n });
    });

    it('keeps every invariant across a random mix of operations', async () => {
        const mod = createModule();
        const parties = ['alice', 'bob', 'carol'];
        for (const party of parties) fund(mod, party, 1_000_000n, 1_000_000n);
        const supplyA = mod.assetA.totalSupply();
        const random = sequence(42);
        const pick = (max: number) => BigInt(1 + Math.floor(random() * max));

        for (let i = 0; i < 300; i++) {
            const party = parties[Math.floor(random() * parties.length)];
            const roll = random();
            try {
                if (mod.pool.status() !== 'Active') {
                    await mod.pool.addLiquidity(party, pick(5000), pick(5000));
                } else if (roll < 0.3) {
                    const amountA = pick(500);
                    await mod.pool.addLiquidity(party, amountA, mod.pool.calculateTokenBDeposit(amountA));
                } else if (roll < 0.75) {
                    await mod.pool.swap(party, random() < 0.5 ? 'A' : 'B', pick(300));
                } else {
                    await mod.pool.removeLiquidity(party, mod.pool.sharesOf(party) / pick(3));
                }
            } catch (error) {
                if (!(error instanceof PoolError)) throw error;
            }

            expect(mod.pool.checkInvariants()).toEqual([]);
            const { reserveA, reserveB } = mod.pool.getReserves();
            expect(mod.assetA.balanceOf('pool')).toBe(reserveA);
            expect(mod.assetB.balanceOf('pool')).toBe(reserveB);
        }
        expect(mod.assetA.totalSupply()).toBe(supplyA);
    });
});
