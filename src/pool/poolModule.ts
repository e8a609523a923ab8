/**
 * Pool Module
 *
 * Wires one pool to its in-memory assets, swap history and file store.
 * The API server and CLI work through this; the core classes do not
 * depend on it.
 */

import { config } from '../config.js';
import { requireAmount } from '../security/input-validator.js';
import { PoolStore, type PoolSnapshotFile } from '../storage/Storage.js';
import { logger } from '../utils/logger.js';
import type { AssetSide } from './LiquidityPool.js';
import { InMemoryAsset } from './InMemoryAsset.js';
import { LiquidityPool } from './LiquidityPool.js';
import { SwapHistory } from './SwapHistory.js';

const log = logger.child('PoolModule');

export interface PoolModuleOptions {
    assetA?: string;
    assetB?: string;
    account?: string;
    ratioTolerance?: bigint;
    allowReseed?: boolean;
    historyLimit?: number;
    /** Omit to keep everything in memory */
    store?: PoolStore | null;
    clock?: () => number;
}

export class PoolModule {
    readonly assetA: InMemoryAsset;
    readonly assetB: InMemoryAsset;
    readonly history: SwapHistory;
    readonly pool: LiquidityPool;
    private readonly store: PoolStore | null;
    private readonly clock: () => number;

    constructor(options: PoolModuleOptions = {}) {
        const account = options.account ?? config.pool.account;
        this.clock = options.clock ?? Date.now;
        this.assetA = new InMemoryAsset(options.assetA ?? config.pool.assetA, account);
        this.assetB = new InMemoryAsset(options.assetB ?? config.pool.assetB, account);
        this.history = new SwapHistory(options.historyLimit ?? config.pool.swapHistoryLimit);
        this.store = options.store ?? null;
        this.pool = new LiquidityPool({
            assetA: this.assetA,
            assetB: this.assetB,
            account,
            ratioTolerance: options.ratioTolerance,
            allowReseed: options.allowReseed,
            onSwap: this.history.listener(),
            clock: this.clock,
        });
    }

    asset(side: AssetSide): InMemoryAsset {
        return side === 'A' ? this.assetA : this.assetB;
    }

    /**
     * Credits a party with freshly minted units (testnet-style faucet).
     */
    faucet(party: string, side: AssetSide, amount: bigint): bigint {
        if (party === this.pool.account) {
            throw new Error('Cannot mint to the pool account directly');
        }
        const balance = this.asset(side).mint(party, amount);
        log.info(`💧 Faucet: ${amount} ${this.asset(side).symbol} → ${party}`);
        return balance;
    }

    snapshot(): PoolSnapshotFile {
        return {
            version: 1,
            savedAt: this.clock(),
            pool: this.pool.getState(),
            balances: {
                A: this.assetA.toJSON(),
                B: this.assetB.toJSON(),
            },
            swaps: this.history.toJSON(),
        };
    }

    /**
     * Everything is parsed and cross-checked before anything is replaced;
     * a rejected snapshot leaves the module as it was.
     */
    restore(data: PoolSnapshotFile): void {
        const balancesA = InMemoryAsset.parseBalances(data.balances.A, 'balances.A');
        const balancesB = InMemoryAsset.parseBalances(data.balances.B, 'balances.B');
        const swaps = SwapHistory.parseRecords(data.swaps);

        const account = this.pool.account;
        const heldA = balancesA.get(account) ?? 0n;
        const heldB = balancesB.get(account) ?? 0n;
        const reserveA = requireAmount(data.pool.reserveA, 'reserveA');
        const reserveB = requireAmount(data.pool.reserveB, 'reserveB');
        if (heldA !== reserveA || heldB !== reserveB) {
            throw new Error(`Pool account holds ${heldA} / ${heldB} but reserves are ${reserveA} / ${reserveB}`);
        }

        this.pool.loadState(data.pool);
        this.assetA.loadBalances(balancesA);
        this.assetB.loadBalances(balancesB);
        this.history.load(swaps);
    }

    /** Returns false when there is no store or nothing saved yet */
    load(): boolean {
        if (!this.store) return false;
        const data = this.store.load();
        if (!data) return false;
        this.restore(data);
        return true;
    }

    save(): void {
        if (!this.store) return;
        this.store.save(this.snapshot());
    }
}

export function createPoolModule(dataDir?: string): PoolModule {
    const poolModule = new PoolModule({ store: new PoolStore(dataDir) });
    poolModule.load();
    return poolModule;
}
