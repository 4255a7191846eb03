/**
 * src/api/server.ts
 *
 * Read API over the insight views.
 *
 *   GET /health
 *   GET /api/v1/insights/health
 *   GET /api/v1/insights/jobs/new
 *   GET /api/v1/insights/jobs/active
 *   GET /api/v1/insights/skills/frequency
 *   GET /api/v1/insights/jobs/:id/timeline
 */

import type { Server } from 'node:http';
import express, { Router, type NextFunction, type Request, type Response } from 'express';
import { log } from 'crawlee';
import { z } from 'zod';
import type { InsightService } from '../analytics/insights.js';
import { AppError, handleError, notFoundHandler } from './errorHandler.js';

type Clock = () => Date;

export interface ApiDeps {
    insights: InsightService;
    clock?: Clock;
}

const jobIdParam = z.object({
    id: z.string().regex(/^\d+$/, 'must be a positive integer'),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
};

function insightRoutes({ insights, clock = () => new Date() }: ApiDeps): Router {
    const router = Router();

    router.get('/health', wrap(async (_req, res) => {
        const counts = await insights.counts();
        res.json({ status: 'UP', service: 'job-market-observer', ...counts });
    }));

    router.get('/jobs/new', wrap(async (_req, res) => {
        res.json(await insights.newJobs(clock()));
    }));

    router.get('/jobs/active', wrap(async (_req, res) => {
        res.json(await insights.activeJobs(clock()));
    }));

    router.get('/skills/frequency', wrap(async (_req, res) => {
        res.json(await insights.skillFrequency(clock()));
    }));

    router.get('/jobs/:id/timeline', wrap(async (req, res) => {
        const { id } = jobIdParam.parse(req.params);
        const timeline = await insights.timeline(id);
        if (timeline.length === 0) throw new AppError(`No observations found for job ${id}`, 404);
        res.json(timeline);
    }));

    return router;
}

export function createApp(deps: ApiDeps): express.Express {
    const app = express();
    app.use(express.json());

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use('/api/v1/insights', insightRoutes(deps));

    app.use('*', notFoundHandler);
    app.use(handleError);
    return app;
}

/** Resolves once the server is listening. */
export function startApiServer(deps: ApiDeps, port: number): Promise<Server> {
    const app = createApp(deps);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            log.info(`[API] Listening on port ${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

export function stopApiServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}
