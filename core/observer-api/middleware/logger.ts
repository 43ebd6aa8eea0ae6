import { Request, Response, NextFunction, RequestHandler } from 'express';
import { randomUUID } from 'crypto';

export interface RequestLoggerOptions {
    now?: () => number;
    newId?: () => string;
    log?: (line: string) => void;
}

const INBOUND_ID = /^[\w-]{8,64}$/;

/**
 * Tags every request with an id (reusing a sane inbound x-request-id) and
 * logs one line when the response finishes. Operator calls under /v1 are
 * marked so they stand out in the console.
 */
export function createRequestLogger(options: RequestLoggerOptions = {}): RequestHandler {
    const now = options.now ?? Date.now;
    const newId = options.newId ?? randomUUID;
    const log = options.log ?? ((line: string) => console.log(line));

    return (req: Request, res: Response, next: NextFunction) => {
        const inbound = req.get('x-request-id');
        const requestId = inbound && INBOUND_ID.test(inbound) ? inbound : newId();
        const start = now();
        res.setHeader('x-request-id', requestId);

        res.on('finish', () => {
            const tag = req.originalUrl.startsWith('/v1') ? '[Observer:op]' : '[Observer]';
            log(`${tag} ${requestId} ${req.method} ${req.originalUrl} -> ${res.statusCode} (${now() - start}ms)`);
        });

        next();
    };
}

export const requestLogger = createRequestLogger();
