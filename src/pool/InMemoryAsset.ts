/**
 * In-memory fungible asset
 *
 * Default transfer collaborator for the pool: a balance map per asset,
 * with a faucet-style mint for funding test and demo parties.
 */

import { requireAmount } from '../security/input-validator.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Asset');

type MaybePromise<T> = T | Promise<T>;

/**
 * What the pool needs from an asset. transfer() moves units out of the
 * account the asset is bound to (the pool). A false result and a thrown
 * error are treated alike by the pool.
 */
export interface AssetTransfer {
    readonly symbol: string;
    transferFrom(from: string, to: string, amount: bigint): MaybePromise<boolean>;
    transfer(to: string, amount: bigint): MaybePromise<boolean>;
}

export class InMemoryAsset implements AssetTransfer {
    readonly symbol: string;
    private readonly custodian: string;
    private balances: Map<string, bigint> = new Map();

    /**
     * @param custodian account that transfer() debits, normally the pool
     */
    constructor(symbol: string, custodian: string) {
        this.symbol = symbol;
        this.custodian = custodian;
    }

    balanceOf(party: string): bigint {
        return this.balances.get(party) ?? 0n;
    }

    totalSupply(): bigint {
        let total = 0n;
        for (const balance of this.balances.values()) total += balance;
        return total;
    }

    mint(party: string, amount: bigint): bigint {
        if (amount <= 0n) {
            throw new Error('Mint amount must be positive');
        }
        const balance = this.balanceOf(party) + amount;
        this.balances.set(party, balance);
        log.debug(`💧 Minted ${amount} ${this.symbol} → ${party}`);
        return balance;
    }

    transferFrom(from: string, to: string, amount: bigint): boolean {
        return this.move(from, to, amount);
    }

    transfer(to: string, amount: bigint): boolean {
        return this.move(this.custodian, to, amount);
    }

    private move(from: string, to: string, amount: bigint): boolean {
        if (amount < 0n) return false;
        const fromBalance = this.balanceOf(from);
        if (fromBalance < amount) {
            log.debug(`Transfer of ${amount} ${this.symbol} from ${from} refused: balance ${fromBalance}`);
            return false;
        }
        if (from === to || amount === 0n) return true;

        this.setBalance(from, fromBalance - amount);
        this.setBalance(to, this.balanceOf(to) + amount);
        return true;
    }

    private setBalance(party: string, balance: bigint): void {
        if (balance === 0n) {
            this.balances.delete(party);
        } else {
            this.balances.set(party, balance);
        }
    }

    // ========== PERSISTENCE ==========

    toJSON(): Record<string, string> {
        return Object.fromEntries(
            Array.from(this.balances.entries()).map(([party, balance]) => [party, balance.toString()])
        );
    }

    static parseBalances(data: Record<string, string>, label: string): Map<string, bigint> {
        return new Map(
            Object.entries(data).map(([party, balance]): [string, bigint] => [party, requireAmount(balance, `${label}.${party}`)])
        );
    }

    loadBalances(balances: ReadonlyMap<string, bigint>): void {
        this.balances = new Map(Array.from(balances).filter(([, balance]) => balance > 0n));
        log.debug(`📂 Loaded ${this.balances.size} ${this.symbol} balances`);
    }
}
