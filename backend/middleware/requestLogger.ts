import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

// Requests slower than this are logged as warnings
const SLOW_REQUEST_MS = 1000;

/**
 * Tags each request with an id and logs it once the response is sent.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const requestId = req.get('x-request-id') || uuidv4();
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
        const responseTime = Date.now() - startTime;
        const logData = {
            requestId,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            responseTime,
            userAgent: req.get('user-agent'),
            ip: req.ip
        };

        if (responseTime > SLOW_REQUEST_MS) {
            logger.warn(`Slow request: ${req.method} ${req.path}`, logData);
        } else {
            logger.info(`HTTP ${req.method} ${req.path} ${res.statusCode}`, logData);
        }
    });

    next();
}
