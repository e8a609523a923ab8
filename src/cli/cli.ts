#!/usr/bin/env node
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { poolCommand } from './commands/pool.js';
import { startCommand } from './commands/start.js';

logger.setLevel(config.logLevel);

const program = new Command();

program
    .name('cpmm')
    .description('Two-asset constant-product liquidity pool')
    .version(config.version);

program.addCommand(startCommand);
program.addCommand(poolCommand);

program.parseAsync().catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
});
