import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import { config } from '../config.js';
import type { PoolModule } from '../pool/poolModule.js';
import { logger } from '../utils/logger.js';
import { createPoolRoutes } from './routes/pool.js';

const log = logger.child('API');

export interface AppOptions {
    rateLimit?: boolean;
}

export function createApp(poolModule: PoolModule, options: AppOptions = {}): Express {
    const app: Express = express();

    app.set('trust proxy', 1);
    app.use(cors(config.api.cors));
    app.use(express.json({ limit: '100kb' }));

    if (options.rateLimit !== false) {
        app.use(rateLimit({
            windowMs: config.api.rateLimit.windowMs,
            max: config.api.rateLimit.maxRequests,
            standardHeaders: true,
            legacyHeaders: false,
            message: {
                success: false,
                error: 'Too many requests, please try again later.',
            },
        }));
    }

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug(`${req.method} ${req.path}`);
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        const info = poolModule.pool.getPoolInfo();
        res.json({
            success: true,
            data: {
                status: 'healthy',
                version: config.version,
                pool: info.status,
                pair: `${info.assetA}/${info.assetB}`,
                busy: poolModule.pool.isBusy(),
            },
        });
    });

    app.use('/api/pool', createPoolRoutes(poolModule));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ success: false, error: 'Not found' });
    });

    // Malformed JSON bodies and anything a route did not handle
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        const status = err instanceof SyntaxError ? 400 : 500;
        if (status === 500) log.error('Unhandled error:', err);
        res.status(status).json({ success: false, error: status === 400 ? 'Malformed request body' : 'Internal error' });
    });

    return app;
}

export function startServer(poolModule: PoolModule, port: number = config.api.port): Promise<Server> {
    const app = createApp(poolModule);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            log.info(`🌐 Pool API listening on http://localhost:${port}`);
            resolve(server);
        });
        server.on('error', reject);
    });
}
