import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../errors.js';
import { log } from '../logger.js';

const MODULE = 'http';

/** Status of a body-parser style client error (bad JSON, payload too large). */
function clientErrorStatus(err: unknown): number | null {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status >= 400 && err.status < 500 ? err.status : null;
    }
    return null;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof ZodError) {
        res.status(400).json({
            error: {
                message: 'Validation failed',
                code: 400,
                details: err.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
            },
        });
        return;
    }

    if (err instanceof AppError) {
        if (err.statusCode >= 500) log.warn(MODULE, err.message, { route: `${req.method} ${req.path}` });
        res.status(err.statusCode).json({ error: { message: err.message, code: err.statusCode } });
        return;
    }

    const message = err instanceof Error ? err.message : String(err);
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
        res.status(clientStatus).json({ error: { message, code: clientStatus } });
        return;
    }

    log.error(MODULE, 'Unhandled error', {
        route: `${req.method} ${req.path}`,
        error: message,
        stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({
        error: {
            message: process.env.NODE_ENV === 'production' ? 'Internal server error' : message,
            code: 500,
        },
    });
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        error: {
            message: `Route ${req.method} ${req.path} not found`,
            code: 404,
        },
    });
}
