import type { Server } from 'node:http';
import express from 'express';
import { z } from 'zod';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { AppError, handleError, notFoundHandler } from './errorHandler.js';
import { stopApiServer } from './server.js';

let server: Server;
let baseUrl: string;

beforeAll(async () => {
    const app = express();
    app.get('/teapot', () => {
        throw new AppError('Short and stout', 418);
    });
    app.get('/invalid', (req) => {
        z.object({ limit: z.coerce.number().int() }).parse(req.query);
    });
    app.get('/broken', () => {
        throw new AppError('Timeline index out of sync', 409, false);
    });
    app.get('/crash', () => {
        throw new Error('connection terminated unexpectedly');
    });
    app.use(notFoundHandler);
    app.use(handleError);

    server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await stopApiServer(server);
});

async function get(path: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
}

describe('handleError', () => {
    it('uses the status of an AppError', async () => {
        expect(await get('/teapot')).toEqual({ status: 418, body: { error: 'Short and stout' } });
    });

    it('maps validation failures to 400 with the first issue', async () => {
        expect(await get('/invalid?limit=lots')).toEqual({
            status: 400,
            body: { error: 'limit: Expected number, received nan' },
        });
    });

    it('hides the details of unexpected errors', async () => {
        expect(await get('/crash')).toEqual({ status: 500, body: { error: 'Internal server error' } });
    });

    it('hides a non-operational AppError behind a 500', async () => {
        expect(await get('/broken')).toEqual({ status: 500, body: { error: 'Internal server error' } });
    });

    it('answers unknown routes with 404', async () => {
        expect(await get('/nowhere')).toEqual({ status: 404, body: { error: 'Route not found' } });
    });
});
