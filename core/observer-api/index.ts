import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createServer, Server } from 'http';
import { requestLogger } from './middleware/logger';
import { createAuthGuard } from './middleware/auth';
import { stateRoutes } from './routes/state';
import { auditRoutes } from './routes/audit';
import { controlRoutes } from './routes/control';
import { ObserverDeps } from './types';

export type { ObserverDeps } from './types';

export function createObserverApp(deps: ObserverDeps): Express {
    const app = express();

    app.use(cors({
        origin: '*',
        methods: ['GET', 'POST', 'DELETE'],
    }));

    app.use(requestLogger);
    app.use(express.json());

    // Read-only
    app.use('/state', stateRoutes(deps));
    app.use('/audit', auditRoutes(deps));

    app.get('/ping', (req: Request, res: Response) => {
        res.json({ status: 'pong', time: new Date().toISOString() });
    });

    // Operator controls (secured)
    if (!deps.token) {
        console.warn('[Observer] OBSERVER_TOKEN is not set; /v1 routes will reject every request');
    }
    app.use('/v1', createAuthGuard(deps.token));
    app.use('/v1', controlRoutes(deps));

    return app;
}

/**
 * Start listening. Resolves once the port is bound.
 */
export function startObserverServer(deps: ObserverDeps, port: number, host = '0.0.0.0'): Promise<Server> {
    const server = createServer(createObserverApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            console.log(`============================================================`);
            console.log(`Carry Guard Observer API`);
            console.log(`Pair: ${deps.pair}`);
            console.log(`Listening on http://${host}:${port}`);
            console.log(`============================================================`);
            resolve(server);
        });
    });
}
