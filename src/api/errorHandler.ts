/**
 * src/api/errorHandler.ts
 *
 * Express error boundary for the read API.
 *
 *   AppError      → its own status, `{ error: message }`
 *   ZodError      → 400 with the first issue
 *   anything else → logged in full, 500 `{ error: 'Internal server error' }`
 *
 * A non-operational AppError is a bug, not a client mistake, and is treated
 * like any other unexpected error.
 */

import type { NextFunction, Request, Response } from 'express';
import { log } from 'crawlee';
import { ZodError } from 'zod';

export class AppError extends Error {
    public statusCode: number;
    public isOperational: boolean;

    constructor(message: string, statusCode: number, isOperational = true) {
        super(message);
        this.name = 'AppError';
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        Error.captureStackTrace(this, this.constructor);
    }
}

export const handleError = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError && err.isOperational) {
        log.warning(`[API] ${req.method} ${req.originalUrl} → ${err.statusCode}: ${err.message}`);
        res.status(err.statusCode).json({ error: err.message });
        return;
    }

    if (err instanceof ZodError) {
        const issue = err.issues[0];
        const message = issue ? `${issue.path.join('.') || 'request'}: ${issue.message}` : 'Invalid request';
        res.status(400).json({ error: message });
        return;
    }

    log.exception(err, `[API] Unexpected error on ${req.method} ${req.originalUrl}`);
    res.status(500).json({ error: 'Internal server error' });
};

export const notFoundHandler = (_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Route not found' });
};
