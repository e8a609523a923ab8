/**
 * Pool Module Exports
 */

export { LiquidityPool } from './LiquidityPool.js';
export type {
    AssetSide,
    LiquidityPoolOptions,
    DepositResult,
    SwapResult,
    PoolInfo,
    PoolStateData,
} from './LiquidityPool.js';

export { ReserveLedger } from './ReserveLedger.js';
export type { ReserveSnapshot } from './ReserveLedger.js';

export { LiquidityAccounting } from './LiquidityAccounting.js';
export type { PoolStatus, DepositPlan, WithdrawPlan, AccountingOptions } from './LiquidityAccounting.js';

export { quoteSwap, quoteAtoB, quoteBtoA, matchingDeposit } from './SwapPricing.js';
export type { SwapDirection, SwapQuote } from './SwapPricing.js';

export { PoolError, isPoolError, requirePositive } from './errors.js';
export type { PoolErrorKind } from './errors.js';

export { InMemoryAsset } from './InMemoryAsset.js';
export type { AssetTransfer } from './InMemoryAsset.js';

export { SwapHistory } from './SwapHistory.js';
export type { SwapRecord, SwapRecordJSON, SwapListener } from './SwapHistory.js';

export { PoolModule, createPoolModule } from './poolModule.js';
export type { PoolModuleOptions } from './poolModule.js';
