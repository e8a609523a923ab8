/**
 * Liquidity Pool - Constant Product AMM (x * y = k)
 *
 * Coordinates deposit, swap and withdraw. Each runs under the pool lock
 * for its whole duration and follows the same order:
 *   1. validate and compute everything against the current snapshot
 *   2. move assets through the transfer collaborators
 *   3. commit ledger and accounting in one synchronous step
 * A failure in 1 or 2 leaves the pool untouched; transfers already made
 * in 2 are reversed before the error is rethrown.
 *
 * No fees. Shares are scaled by PRECISION (1e18).
 */

import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { requireAmount } from '../security/input-validator.js';
import { PoolLock, SafeMath } from '../security/transaction-guard.js';
import { PoolError, requirePositive } from './errors.js';
import type { AssetTransfer } from './InMemoryAsset.js';
import { LiquidityAccounting, type PoolStatus, type WithdrawPlan } from './LiquidityAccounting.js';
import { ReserveLedger, type ReserveSnapshot } from './ReserveLedger.js';
import type { SwapListener, SwapRecord } from './SwapHistory.js';
import { matchingDeposit, quoteSwap, type SwapDirection } from './SwapPricing.js';

const log = logger.child('Pool');

// ========== INTERFACES ==========

export type AssetSide = 'A' | 'B';

export interface LiquidityPoolOptions {
    assetA: AssetTransfer;
    assetB: AssetTransfer;
    /** Party id the pool holds its reserves under */
    account?: string;
    ratioTolerance?: bigint;
    allowReseed?: boolean;
    onSwap?: SwapListener;
    clock?: () => number;
}

export interface DepositResult {
    minted: bigint;
    seeded: boolean;
    amountA: bigint;
    amountB: bigint;
}

export interface SwapResult {
    record: SwapRecord;
    amountOut: bigint;
}

export interface PoolInfo {
    status: PoolStatus;
    assetA: string;
    assetB: string;
    reserveA: bigint;
    reserveB: bigint;
    constantProduct: bigint;
    totalShares: bigint;
    providers: number;
    createdAt: number;
    lastUpdateAt: number;
}

export interface PoolStateData {
    assetA: string;
    assetB: string;
    initialized: boolean;
    reserveA: string;
    reserveB: string;
    constantProduct: string;
    totalShares: string;
    positions: Record<string, string>;
    createdAt: number;
    lastUpdateAt: number;
}

// ========== LIQUIDITY POOL CLASS ==========

export class LiquidityPool {
    readonly assetA: AssetTransfer;
    readonly assetB: AssetTransfer;
    readonly account: string;

    private readonly ledger = new ReserveLedger();
    private readonly accounting: LiquidityAccounting;
    private readonly lock = new PoolLock();
    private readonly onSwap?: SwapListener;
    private readonly clock: () => number;
    private createdAt = 0;
    private lastUpdateAt = 0;

    constructor(options: LiquidityPoolOptions) {
        if (options.assetA.symbol === options.assetB.symbol) {
            throw new Error(`Pool assets must differ, both are ${options.assetA.symbol}`);
        }
        this.assetA = options.assetA;
        this.assetB = options.assetB;
        this.account = options.account ?? config.pool.account;
        this.accounting = new LiquidityAccounting({
            ratioTolerance: options.ratioTolerance ?? config.pool.ratioTolerance,
            allowReseed: options.allowReseed ?? config.pool.allowReseed,
        });
        this.onSwap = options.onSwap;
        this.clock = options.clock ?? Date.now;
    }

    // ========== ADD LIQUIDITY ==========

    async addLiquidity(party: string, amountA: bigint, amountB: bigint): Promise<bigint> {
        const result = await this.deposit(party, amountA, amountB);
        return result.minted;
    }

    deposit(party: string, amountA: bigint, amountB: bigint): Promise<DepositResult> {
        return this.lock.run('deposit', async () => {
            this.requireExternal(party);
            requirePositive(amountA, 'amountA');
            requirePositive(amountB, 'amountB');

            const reserves = this.ledger.snapshot();
            const plan = this.accounting.sharesForDeposit(reserves, amountA, amountB);
            const staged = ReserveLedger.project(
                SafeMath.add(reserves.reserveA, amountA),
                SafeMath.add(reserves.reserveB, amountB)
            );
            // Share supply must stay in range too
            SafeMath.add(this.accounting.getTotalShares(), plan.minted);

            await this.pull(this.assetA, party, amountA, 'deposit');
            try {
                await this.pull(this.assetB, party, amountB, 'deposit');
            } catch (error) {
                await this.refund(this.assetA, party, amountA);
                throw error;
            }

            this.ledger.commit(staged.reserveA, staged.reserveB);
            this.accounting.mint(party, plan.minted);
            this.touch(plan.seeded);

            if (plan.seeded) {
                log.info(`🏊 Pool seeded by ${party}: ${amountA} ${this.assetA.symbol} + ${amountB} ${this.assetB.symbol} = ${plan.minted} shares`);
            } else {
                log.info(`➕ Liquidity added by ${party}: ${amountA} ${this.assetA.symbol} + ${amountB} ${this.assetB.symbol} = ${plan.minted} shares`);
            }

            return { minted: plan.minted, seeded: plan.seeded, amountA, amountB };
        });
    }

    // ========== SWAP ==========

    async swapTokenA(party: string, amountA: bigint): Promise<bigint> {
        const result = await this.swap(party, 'A', amountA);
        return result.amountOut;
    }

    async swapTokenB(party: string, amountB: bigint): Promise<bigint> {
        const result = await this.swap(party, 'B', amountB);
        return result.amountOut;
    }

    swap(party: string, assetIn: AssetSide, amountIn: bigint): Promise<SwapResult> {
        return this.lock.run('swap', async () => {
            this.requireExternal(party);
            requirePositive(amountIn, 'amountIn');
            this.requireActive();

            const direction: SwapDirection = assetIn === 'A' ? 'AtoB' : 'BtoA';
            const quote = quoteSwap(this.ledger.snapshot(), direction, amountIn);
            const staged = ReserveLedger.project(quote.newReserveA, quote.newReserveB);

            const tokenIn = assetIn === 'A' ? this.assetA : this.assetB;
            const tokenOut = assetIn === 'A' ? this.assetB : this.assetA;

            await this.pull(tokenIn, party, amountIn, 'swap');
            try {
                await this.push(tokenOut, party, quote.amountOut, 'swap');
            } catch (error) {
                await this.refund(tokenIn, party, amountIn);
                throw error;
            }

            const committed = this.ledger.commit(staged.reserveA, staged.reserveB);
            this.touch(false);
            log.debug(`Swap committed for ${party}: ${amountIn} ${tokenIn.symbol} → ${quote.amountOut} ${tokenOut.symbol}`);

            const record: SwapRecord = {
                party,
                assetIn: tokenIn.symbol,
                amountIn,
                assetOut: tokenOut.symbol,
                amountOut: quote.amountOut,
                newReserveA: committed.reserveA,
                newReserveB: committed.reserveB,
                timestamp: this.lastUpdateAt,
            };
            this.emitSwap(record);

            return { record, amountOut: quote.amountOut };
        });
    }

    // ========== REMOVE LIQUIDITY ==========

    removeLiquidity(party: string, shares: bigint): Promise<WithdrawPlan> {
        return this.lock.run('withdraw', async () => {
            this.requireExternal(party);
            requirePositive(shares, 'shares');

            const reserves = this.ledger.snapshot();
            const amounts = this.accounting.amountsForWithdraw(reserves, shares);
            this.accounting.requireOwned(party, shares);
            const staged = ReserveLedger.project(
                SafeMath.sub(reserves.reserveA, amounts.amountA),
                SafeMath.sub(reserves.reserveB, amounts.amountB)
            );

            await this.push(this.assetA, party, amounts.amountA, 'withdraw');
            try {
                await this.push(this.assetB, party, amounts.amountB, 'withdraw');
            } catch (error) {
                await this.reclaim(this.assetA, party, amounts.amountA);
                throw error;
            }

            this.ledger.commit(staged.reserveA, staged.reserveB);
            this.accounting.burn(party, shares);
            this.touch(false);

            log.info(`➖ Liquidity removed by ${party}: ${shares} shares → ${amounts.amountA} ${this.assetA.symbol} + ${amounts.amountB} ${this.assetB.symbol}`);
            if (this.accounting.getTotalShares() === 0n) {
                log.warn('Pool fully withdrawn');
            }

            return amounts;
        });
    }

    // ========== QUERIES ==========

    calculateTokenBDeposit(amountA: bigint): bigint {
        return matchingDeposit(this.ledger.snapshot(), 'A', amountA);
    }

    calculateTokenADeposit(amountB: bigint): bigint {
        return matchingDeposit(this.ledger.snapshot(), 'B', amountB);
    }

    calculateTokenASwap(amountA: bigint): bigint {
        this.requireActive();
        return quoteSwap(this.ledger.snapshot(), 'AtoB', amountA).amountOut;
    }

    calculateTokenBSwap(amountB: bigint): bigint {
        this.requireActive();
        return quoteSwap(this.ledger.snapshot(), 'BtoA', amountB).amountOut;
    }

    calculateWithdrawAmount(shares: bigint): WithdrawPlan {
        requirePositive(shares, 'shares');
        return this.accounting.amountsForWithdraw(this.ledger.snapshot(), shares);
    }

    sharesOf(party: string): bigint {
        return this.accounting.sharesOf(party);
    }

    getTotalShares(): bigint {
        return this.accounting.getTotalShares();
    }

    getReserves(): ReserveSnapshot {
        return this.ledger.snapshot();
    }

    status(): PoolStatus {
        return this.accounting.status();
    }

    isBusy(): boolean {
        return this.lock.isLocked();
    }

    getPoolInfo(): PoolInfo {
        const reserves = this.ledger.snapshot();
        return {
            status: this.accounting.status(),
            assetA: this.assetA.symbol,
            assetB: this.assetB.symbol,
            reserveA: reserves.reserveA,
            reserveB: reserves.reserveB,
            constantProduct: reserves.constantProduct,
            totalShares: this.accounting.getTotalShares(),
            providers: this.accounting.providerCount(),
            createdAt: this.createdAt,
            lastUpdateAt: this.lastUpdateAt,
        };
    }

    /**
     * Returns every broken invariant; empty when the pool is consistent.
     */
    checkInvariants(): string[] {
        const { reserveA, reserveB, constantProduct } = this.ledger.snapshot();
        const total = this.accounting.getTotalShares();
        const violations: string[] = [];

        if (constantProduct !== reserveA * reserveB) {
            violations.push(`constantProduct ${constantProduct} != ${reserveA} * ${reserveB}`);
        }
        if (total > 0n && (reserveA === 0n || reserveB === 0n)) {
            violations.push(`empty reserve with ${total} shares outstanding`);
        }
        if (total === 0n && (reserveA !== 0n || reserveB !== 0n)) {
            violations.push(`reserves ${reserveA} / ${reserveB} with no shares outstanding`);
        }

        let sum = 0n;
        for (const [party, shares] of this.accounting.getPositions()) {
            if (shares <= 0n) violations.push(`non-positive position for ${party}`);
            if (shares > total) violations.push(`position of ${party} exceeds total shares`);
            sum += shares;
        }
        if (sum !== total) {
            violations.push(`positions sum to ${sum}, totalShares is ${total}`);
        }
        return violations;
    }

    // ========== SERIALIZATION ==========

    getState(): PoolStateData {
        const reserves = this.ledger.snapshot();
        return {
            assetA: this.assetA.symbol,
            assetB: this.assetB.symbol,
            initialized: this.accounting.isInitialized(),
            reserveA: reserves.reserveA.toString(),
            reserveB: reserves.reserveB.toString(),
            constantProduct: reserves.constantProduct.toString(),
            totalShares: this.accounting.getTotalShares().toString(),
            positions: Object.fromEntries(
                Array.from(this.accounting.getPositions().entries()).map(([party, shares]) => [party, shares.toString()])
            ),
            createdAt: this.createdAt,
            lastUpdateAt: this.lastUpdateAt,
        };
    }

    /**
     * Replaces the pool state. Rejected (and the previous state kept) when
     * the data belongs to another asset pair or breaks an invariant.
     */
    loadState(data: PoolStateData): void {
        if (this.lock.isLocked()) {
            throw new Error('Cannot load state while an operation is in progress');
        }
        if (data.assetA !== this.assetA.symbol || data.assetB !== this.assetB.symbol) {
            throw new Error(`State is for ${data.assetA}/${data.assetB}, pool trades ${this.assetA.symbol}/${this.assetB.symbol}`);
        }

        const reserveA = requireAmount(data.reserveA, 'reserveA');
        const reserveB = requireAmount(data.reserveB, 'reserveB');
        const totalShares = requireAmount(data.totalShares, 'totalShares');
        const positions = new Map(
            Object.entries(data.positions).map(([party, shares]): [string, bigint] => [party, requireAmount(shares, `positions.${party}`)])
        );

        const previousReserves = this.ledger.snapshot();
        const previousTotal = this.accounting.getTotalShares();
        const previousPositions = new Map(this.accounting.getPositions());
        const previousInitialized = this.accounting.isInitialized();

        const committed = this.ledger.commit(reserveA, reserveB);
        this.accounting.load(totalShares, positions, data.initialized);

        const violations = this.checkInvariants();
        if (committed.constantProduct.toString() !== data.constantProduct) {
            violations.push(`stored constantProduct ${data.constantProduct} does not match reserves`);
        }
        if (violations.length > 0) {
            this.ledger.commit(previousReserves.reserveA, previousReserves.reserveB);
            this.accounting.load(previousTotal, previousPositions, previousInitialized);
            throw new Error(`Invalid pool state: ${violations.join('; ')}`);
        }

        this.createdAt = data.createdAt;
        this.lastUpdateAt = data.lastUpdateAt;
        log.info(`📂 Pool state loaded: ${data.reserveA} ${data.assetA}, ${data.reserveB} ${data.assetB}, ${data.totalShares} shares`);
    }

    // ========== INTERNALS ==========

    // Transfers between the pool account and itself move nothing
    private requireExternal(party: string): void {
        if (party === this.account) {
            throw new PoolError('ReservedParty', `${party} is the pool account and cannot trade with the pool`, { party });
        }
    }

    private requireActive(): void {
        if (this.accounting.getTotalShares() === 0n) {
            throw new PoolError('PoolNotInitialized', 'Pool holds no liquidity');
        }
    }

    private touch(seeded: boolean): void {
        this.lastUpdateAt = this.clock();
        if (seeded) this.createdAt = this.lastUpdateAt;
    }

    private emitSwap(record: SwapRecord): void {
        if (!this.onSwap) return;
        try {
            this.onSwap(record);
        } catch (error) {
            // The swap is committed; a broken listener must not report it as failed
            log.error('Swap listener failed:', error);
        }
    }

    private async attempt(asset: AssetTransfer, action: string, fn: () => boolean | Promise<boolean>): Promise<boolean> {
        try {
            return (await fn()) === true;
        } catch (error) {
            log.warn(`${asset.symbol} ${action} threw: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    /** party -> pool */
    private async pull(asset: AssetTransfer, party: string, amount: bigint, operation: string): Promise<void> {
        const ok = await this.attempt(asset, 'transferFrom', () => asset.transferFrom(party, this.account, amount));
        if (!ok) {
            log.warn(`${operation} aborted: could not take ${amount} ${asset.symbol} from ${party}`);
            throw new PoolError('TransferFailed', `Transfer of ${amount} ${asset.symbol} from ${party} failed`, {
                asset: asset.symbol,
                direction: 'in',
                amount,
            });
        }
    }

    /** pool -> party */
    private async push(asset: AssetTransfer, party: string, amount: bigint, operation: string): Promise<void> {
        const ok = await this.attempt(asset, 'transfer', () => asset.transfer(party, amount));
        if (!ok) {
            log.warn(`${operation} aborted: could not send ${amount} ${asset.symbol} to ${party}`);
            throw new PoolError('TransferFailed', `Transfer of ${amount} ${asset.symbol} to ${party} failed`, {
                asset: asset.symbol,
                direction: 'out',
                amount,
            });
        }
    }

    /** Undo a pull */
    private async refund(asset: AssetTransfer, party: string, amount: bigint): Promise<void> {
        const ok = await this.attempt(asset, 'refund', () => asset.transfer(party, amount));
        if (!ok) {
            log.error(`Refund of ${amount} ${asset.symbol} to ${party} failed; pool account holds it outside the reserves`);
        }
    }

    /** Undo a push */
    private async reclaim(asset: AssetTransfer, party: string, amount: bigint): Promise<void> {
        const ok = await this.attempt(asset, 'reclaim', () => asset.transferFrom(party, this.account, amount));
        if (!ok) {
            log.error(`Reclaim of ${amount} ${asset.symbol} from ${party} failed; reserves overstate the pool account`);
        }
    }
}
