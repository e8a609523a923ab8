/**
 * Pool CLI Commands
 * Operate on the pool saved under --data (default DATA_DIR)
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import { isPoolError } from '../../pool/errors.js';
import { createPoolModule, type PoolModule } from '../../pool/poolModule.js';
import { parseAmount, parseAssetSide, validateParty, type ValidationResult } from '../../security/input-validator.js';
import cli, { sym, c } from '../../utils/cli.js';

interface DataOption {
    data: string;
}

function unwrap<T>(result: ValidationResult<T>): T {
    if (!result.valid) {
        throw new Error(result.error);
    }
    return result.value;
}

function fail(error: unknown): never {
    const message = error instanceof Error ? error.message : 'Unknown error';
    cli.error(isPoolError(error) ? `${error.kind}: ${message}` : message);
    process.exit(1);
}

/**
 * Loads the pool, runs the action, saves when asked to, and exits with 0 or 1.
 */
async function withPool(
    options: DataOption,
    action: (poolModule: PoolModule) => Promise<void> | void,
    save: boolean = true
): Promise<void> {
    try {
        const poolModule = createPoolModule(options.data);
        await action(poolModule);
        if (save) poolModule.save();
    } catch (error) {
        fail(error);
    }
    process.exit(0);
}

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

poolCommand
    .command('info')
    .description('Show reserves, shares and status')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption) => {
        await withPool(options, ({ pool }) => {
            const info = pool.getPoolInfo();
            console.log('');
            if (info.status !== 'Active') {
                console.log(cli.warningBox(
                    `Use ${c.primary('cpmm pool add')} to seed the pool`,
                    `${sym.warning_emoji} Pool ${info.status}`
                ));
                console.log('');
                return;
            }
            console.log(cli.infoBox(cli.rows([
                [`Reserve ${info.assetA}`, info.reserveA.toString()],
                [`Reserve ${info.assetB}`, info.reserveB.toString()],
                ['k', info.constantProduct.toString()],
                ['Total shares', info.totalShares.toString()],
                ['Providers', info.providers.toString()],
            ]), `${sym.gem} ${info.assetA}/${info.assetB} Pool`));
            console.log('');
        }, false);
    });

poolCommand
    .command('quote')
    .description('Quote a swap without executing it')
    .requiredOption('--from <asset>', 'Asset to swap from (A or B)')
    .requiredOption('--amount <units>', 'Amount to swap')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { from: string; amount: string }) => {
        await withPool(options, (poolModule) => {
            const side = unwrap(parseAssetSide(options.from, 'from'));
            const amount = unwrap(parseAmount(options.amount));
            const out = side === 'A'
                ? poolModule.pool.calculateTokenASwap(amount)
                : poolModule.pool.calculateTokenBSwap(amount);
            const otherSide = side === 'A' ? 'B' : 'A';

            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['Swap', `${amount} ${poolModule.asset(side).symbol} ${sym.arrow} ${out} ${poolModule.asset(otherSide).symbol}`],
                ['Reserves', `${poolModule.pool.getReserves().reserveA} / ${poolModule.pool.getReserves().reserveB}`],
            ]), `${sym.lightning} Swap Quote`));
            console.log('');
        }, false);
    });

poolCommand
    .command('faucet')
    .description('Mint test units of an asset to a party')
    .requiredOption('--party <id>', 'Receiving party')
    .requiredOption('--asset <asset>', 'A or B')
    .requiredOption('--amount <units>', 'Amount to mint')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { party: string; asset: string; amount: string }) => {
        await withPool(options, (poolModule) => {
            const party = unwrap(validateParty(options.party));
            const side = unwrap(parseAssetSide(options.asset));
            const balance = poolModule.faucet(party, side, unwrap(parseAmount(options.amount)));
            cli.success(`${party} now holds ${balance} ${poolModule.asset(side).symbol}`);
        });
    });

poolCommand
    .command('add')
    .description('Deposit both assets and receive pool shares')
    .requiredOption('--party <id>', 'Depositing party')
    .requiredOption('--a <units>', 'Amount of asset A')
    .requiredOption('--b <units>', 'Amount of asset B')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { party: string; a: string; b: string }) => {
        await withPool(options, async ({ pool }) => {
            const party = unwrap(validateParty(options.party));
            const result = await pool.deposit(
                party,
                unwrap(parseAmount(options.a, 'a')),
                unwrap(parseAmount(options.b, 'b'))
            );

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Added', `${result.amountA} ${pool.assetA.symbol} + ${result.amountB} ${pool.assetB.symbol}`],
                ['Minted', `${result.minted} shares${result.seeded ? ' (seed)' : ''}`],
                ['Position', `${pool.sharesOf(party)} shares`],
            ]), `${sym.check} Liquidity Added`));
            console.log('');
        });
    });

poolCommand
    .command('swap')
    .description('Swap one asset for the other')
    .requiredOption('--party <id>', 'Swapping party')
    .requiredOption('--from <asset>', 'Asset to pay with (A or B)')
    .requiredOption('--amount <units>', 'Amount to pay')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { party: string; from: string; amount: string }) => {
        await withPool(options, async ({ pool }) => {
            const party = unwrap(validateParty(options.party));
            const side = unwrap(parseAssetSide(options.from, 'from'));
            const { record } = await pool.swap(party, side, unwrap(parseAmount(options.amount)));

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['In', `${record.amountIn} ${record.assetIn}`],
                ['Out', `${record.amountOut} ${record.assetOut}`],
                ['Reserves', `${record.newReserveA} / ${record.newReserveB}`],
            ]), `${sym.lightning} Swap Executed`));
            console.log('');
        });
    });

poolCommand
    .command('remove')
    .description('Burn shares for a proportional slice of both reserves')
    .requiredOption('--party <id>', 'Share owner')
    .requiredOption('--shares <units>', 'Shares to burn')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { party: string; shares: string }) => {
        await withPool(options, async ({ pool }) => {
            const party = unwrap(validateParty(options.party));
            const shares = unwrap(parseAmount(options.shares, 'shares'));
            const amounts = await pool.removeLiquidity(party, shares);

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Burned', `${shares} shares`],
                ['Received', `${amounts.amountA} ${pool.assetA.symbol} + ${amounts.amountB} ${pool.assetB.symbol}`],
            ]), `${sym.check} Liquidity Removed`));
            console.log('');
        });
    });

poolCommand
    .command('shares')
    .description('Show a party\'s shares and balances')
    .requiredOption('--party <id>', 'Party to inspect')
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: DataOption & { party: string }) => {
        await withPool(options, (poolModule) => {
            const party = unwrap(validateParty(options.party));
            const shares = poolModule.pool.sharesOf(party);
            const withdrawable = shares > 0n ? poolModule.pool.calculateWithdrawAmount(shares) : { amountA: 0n, amountB: 0n };

            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['Shares', `${shares} of ${poolModule.pool.getTotalShares()}`],
                ['Redeemable', `${withdrawable.amountA} ${poolModule.assetA.symbol} + ${withdrawable.amountB} ${poolModule.assetB.symbol}`],
                [`Wallet ${poolModule.assetA.symbol}`, poolModule.assetA.balanceOf(party).toString()],
                [`Wallet ${poolModule.assetB.symbol}`, poolModule.assetB.balanceOf(party).toString()],
            ]), `${sym.gem} ${party}`));
            console.log('');
        }, false);
    });
