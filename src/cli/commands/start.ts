import { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { config } from '../../config.js';
import { createPoolModule } from '../../pool/poolModule.js';
import { logger } from '../../utils/logger.js';
import { sym, c } from '../../utils/cli.js';

const log = logger.child('Start');

export interface StartOptions {
    port: string;
    data: string;
}

export async function startPoolServer(options: StartOptions): Promise<void> {
    const port = Number(options.port);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid port: ${options.port}`);
    }

    const poolModule = createPoolModule(options.data);
    const info = poolModule.pool.getPoolInfo();
    log.info(`${sym.rocket} ${info.assetA}/${info.assetB} pool ${c.bold(info.status)}, data in ${options.data}`);

    const server = await startServer(poolModule, port);

    process.on('SIGINT', () => {
        log.info('Shutting down...');
        poolModule.save();
        server.close(() => process.exit(0));
    });
}

export const startCommand = new Command('start')
    .description('Serve the pool HTTP API')
    .option('-p, --port <number>', 'API server port', String(config.api.port))
    .option('-d, --data <path>', 'Data directory', config.storage.dataDir)
    .action(async (options: StartOptions) => {
        await startPoolServer(options);
    });
