// ========================================
// Smart Inspection - Status HTTP API
// ========================================

import express, { Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { SensorGateway } from './devices/sensors.js';
import type { Logger } from './logger.js';
import type { InspectionOrchestrator } from './orchestrator.js';

export interface StatusApiDeps {
    sensors: Pick<SensorGateway, 'snapshot'>;
    orchestrator: Pick<InspectionOrchestrator, 'currentState' | 'isRunning'>;
    logger: Logger;
    version?: string;
}

/**
 * Read-only view of the rig: health, live sensor/LED snapshot and the
 * inspection state machine. Nothing here can actuate hardware.
 */
export function createStatusApp(deps: StatusApiDeps) {
    const app = express();
    const logger = deps.logger.child('api');

    app.use(cors());

    // Request logging (skip health checks)
    app.use((req, _res, next) => {
        if (req.path !== '/health') {
            logger.debug(`${req.method} ${req.path}`);
        }
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            service: 'smart-inspection',
            version: deps.version ?? '1.0.0',
            timestamp: new Date().toISOString(),
        });
    });

    app.get('/status', async (_req: Request, res: Response) => {
        try {
            const snapshot = await deps.sensors.snapshot();
            res.json({ ok: true, ...snapshot });
        } catch (error) {
            logger.error('Status snapshot failed', error);
            res.status(503).json({
                ok: false,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    });

    app.get('/inspection', (_req: Request, res: Response) => {
        res.json({
            state: deps.orchestrator.currentState,
            running: deps.orchestrator.isRunning,
        });
    });

    return app;
}

export function startStatusServer(deps: StatusApiDeps, port: number, host = '0.0.0.0'): Promise<Server> {
    const app = createStatusApp(deps);
    return new Promise<Server>((resolve, reject) => {
        const server = app.listen(port, host, () => {
            deps.logger.info(`Status API listening on http://${host}:${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}
