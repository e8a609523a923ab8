/**
 * Pool API Routes
 *
 * Amounts are decimal strings in both directions. Party ids are taken
 * from the request body as given; authenticating them is left to
 * whatever sits in front of this API.
 */

import { Router, Request, Response } from 'express';
import { isPoolError, type PoolErrorKind } from '../../pool/errors.js';
import type { PoolModule } from '../../pool/poolModule.js';
import { parseAmount, parseAssetSide, validateParty, type ValidationResult } from '../../security/input-validator.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('PoolAPI');

const STATUS_BY_KIND: Record<PoolErrorKind, number> = {
    InvalidAmount: 400,
    RatioMismatch: 400,
    InsufficientOwnedShares: 400,
    InsufficientPoolShares: 400,
    Overflow: 400,
    PoolDrainage: 409,
    PoolDrained: 409,
    PoolNotInitialized: 409,
    ReservedParty: 403,
    TransferFailed: 422,
};

function sendError(res: Response, error: unknown, fallback: string): void {
    if (isPoolError(error)) {
        res.status(STATUS_BY_KIND[error.kind]).json({
            success: false,
            kind: error.kind,
            error: error.message,
            details: error.details,
        });
        return;
    }
    log.error(`${fallback}:`, error);
    res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : fallback,
    });
}

/**
 * The operation is already committed in memory by the time this runs, so a
 * failed write is logged and the response still reports the result.
 */
function persist(poolModule: PoolModule, operation: string): void {
    try {
        poolModule.save();
    } catch (error) {
        log.error(`${operation} committed but the pool could not be saved:`, error);
    }
}

/** Sends a 400 and returns null when the input is invalid */
function required<T>(res: Response, result: ValidationResult<T>): T | null {
    if (!result.valid) {
        res.status(400).json({ success: false, error: result.error });
        return null;
    }
    return result.value;
}

export function createPoolRoutes(poolModule: PoolModule): Router {
    const router = Router();
    const { pool } = poolModule;

    /**
     * GET /api/pool/info
     */
    router.get('/info', (_req: Request, res: Response) => {
        const info = pool.getPoolInfo();
        res.json({
            success: true,
            data: {
                status: info.status,
                assets: { A: info.assetA, B: info.assetB },
                reserves: { A: info.reserveA.toString(), B: info.reserveB.toString() },
                constantProduct: info.constantProduct.toString(),
                shares: {
                    total: info.totalShares.toString(),
                    providers: info.providers,
                },
                createdAt: info.createdAt,
                lastUpdateAt: info.lastUpdateAt,
            },
        });
    });

    /**
     * GET /api/pool/shares/:party
     */
    router.get('/shares/:party', (req: Request, res: Response) => {
        const party = required(res, validateParty(req.params.party));
        if (party === null) return;

        res.json({
            success: true,
            data: {
                party,
                shares: pool.sharesOf(party).toString(),
                totalShares: pool.getTotalShares().toString(),
                balances: {
                    A: poolModule.assetA.balanceOf(party).toString(),
                    B: poolModule.assetB.balanceOf(party).toString(),
                },
            },
        });
    });

    /**
     * GET /api/pool/quote?from=A|B&amount=
     */
    router.get('/quote', (req: Request, res: Response) => {
        const side = required(res, parseAssetSide(req.query.from, 'from'));
        if (side === null) return;
        const amount = required(res, parseAmount(req.query.amount));
        if (amount === null) return;

        try {
            const amountOut = side === 'A' ? pool.calculateTokenASwap(amount) : pool.calculateTokenBSwap(amount);
            res.json({
                success: true,
                data: {
                    assetIn: poolModule.asset(side).symbol,
                    assetOut: poolModule.asset(side === 'A' ? 'B' : 'A').symbol,
                    amountIn: amount.toString(),
                    amountOut: amountOut.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Quote failed');
        }
    });

    /**
     * GET /api/pool/deposit-quote?asset=A|B&amount=
     * Amount of the other asset that keeps the reserve ratio.
     */
    router.get('/deposit-quote', (req: Request, res: Response) => {
        const side = required(res, parseAssetSide(req.query.asset));
        if (side === null) return;
        const amount = required(res, parseAmount(req.query.amount));
        if (amount === null) return;

        try {
            const other = side === 'A' ? pool.calculateTokenBDeposit(amount) : pool.calculateTokenADeposit(amount);
            res.json({
                success: true,
                data: {
                    amountA: (side === 'A' ? amount : other).toString(),
                    amountB: (side === 'A' ? other : amount).toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Deposit quote failed');
        }
    });

    /**
     * GET /api/pool/withdraw-quote?shares=
     */
    router.get('/withdraw-quote', (req: Request, res: Response) => {
        const shares = required(res, parseAmount(req.query.shares, 'shares'));
        if (shares === null) return;

        try {
            const amounts = pool.calculateWithdrawAmount(shares);
            res.json({
                success: true,
                data: {
                    shares: shares.toString(),
                    amountA: amounts.amountA.toString(),
                    amountB: amounts.amountB.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Withdraw quote failed');
        }
    });

    /**
     * GET /api/pool/swaps?limit=
     * Newest first.
     */
    router.get('/swaps', (req: Request, res: Response) => {
        const limit = req.query.limit === undefined ? 20 : Number(req.query.limit);
        if (!Number.isInteger(limit) || limit <= 0 || limit > 1000) {
            res.status(400).json({ success: false, error: 'limit must be an integer between 1 and 1000' });
            return;
        }
        const swaps = poolModule.history.recent(limit).map((s) => ({
            ...s,
            amountIn: s.amountIn.toString(),
            amountOut: s.amountOut.toString(),
            newReserveA: s.newReserveA.toString(),
            newReserveB: s.newReserveB.toString(),
        }));
        res.json({ success: true, data: swaps });
    });

    /**
     * POST /api/pool/add-liquidity { party, amountA, amountB }
     */
    router.post('/add-liquidity', async (req: Request, res: Response) => {
        const party = required(res, validateParty(req.body?.party));
        if (party === null) return;
        const amountA = required(res, parseAmount(req.body?.amountA, 'amountA'));
        if (amountA === null) return;
        const amountB = required(res, parseAmount(req.body?.amountB, 'amountB'));
        if (amountB === null) return;

        try {
            const result = await pool.deposit(party, amountA, amountB);
            persist(poolModule, 'Add liquidity');
            res.json({
                success: true,
                data: {
                    party,
                    minted: result.minted.toString(),
                    seeded: result.seeded,
                    shares: pool.sharesOf(party).toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Add liquidity failed');
        }
    });

    /**
     * POST /api/pool/swap { party, assetIn, amountIn }
     */
    router.post('/swap', async (req: Request, res: Response) => {
        const party = required(res, validateParty(req.body?.party));
        if (party === null) return;
        const side = required(res, parseAssetSide(req.body?.assetIn, 'assetIn'));
        if (side === null) return;
        const amountIn = required(res, parseAmount(req.body?.amountIn, 'amountIn'));
        if (amountIn === null) return;

        try {
            const { record } = await pool.swap(party, side, amountIn);
            persist(poolModule, 'Swap');
            res.json({
                success: true,
                data: {
                    party,
                    assetIn: record.assetIn,
                    amountIn: record.amountIn.toString(),
                    assetOut: record.assetOut,
                    amountOut: record.amountOut.toString(),
                    reserves: { A: record.newReserveA.toString(), B: record.newReserveB.toString() },
                    timestamp: record.timestamp,
                },
            });
        } catch (error) {
            sendError(res, error, 'Swap failed');
        }
    });

    /**
     * POST /api/pool/remove-liquidity { party, shares }
     */
    router.post('/remove-liquidity', async (req: Request, res: Response) => {
        const party = required(res, validateParty(req.body?.party));
        if (party === null) return;
        const shares = required(res, parseAmount(req.body?.shares, 'shares'));
        if (shares === null) return;

        try {
            const amounts = await pool.removeLiquidity(party, shares);
            persist(poolModule, 'Remove liquidity');
            res.json({
                success: true,
                data: {
                    party,
                    burned: shares.toString(),
                    amountA: amounts.amountA.toString(),
                    amountB: amounts.amountB.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Remove liquidity failed');
        }
    });

    /**
     * POST /api/pool/faucet { party, asset, amount }
     */
    router.post('/faucet', (req: Request, res: Response) => {
        const party = required(res, validateParty(req.body?.party));
        if (party === null) return;
        const side = required(res, parseAssetSide(req.body?.asset));
        if (side === null) return;
        const amount = required(res, parseAmount(req.body?.amount));
        if (amount === null) return;

        try {
            const balance = poolModule.faucet(party, side, amount);
            persist(poolModule, 'Faucet');
            res.json({
                success: true,
                data: { party, asset: poolModule.asset(side).symbol, balance: balance.toString() },
            });
        } catch (error) {
            res.status(400).json({
                success: false,
                error: error instanceof Error ? error.message : 'Faucet failed',
            });
        }
    });

    return router;
}
