import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { config } from './config/app';
import { AnalysisEngine, createAnalysisEngine } from './engine';
import { logger } from './utils/logger';
import { ErrorCodes } from './utils/errors';
import { errorHandler, notFoundHandler, setupUncaughtExceptionHandling } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createAnalysisRoutes } from './routes/analysisRoutes';

/**
 * HTTP wrapper around the analysis engine.
 */
export function createApp(engine: AnalysisEngine) {
    const app = express();

    app.use(cors(config.cors));
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    if (config.server.isDevelopment) {
        app.use(morgan('dev'));
    }
    app.use(requestLogger);

    app.use(
        rateLimit({
            windowMs: config.rateLimit.windowMs,
            max: config.rateLimit.max,
            message: {
                success: false,
                error: {
                    code: ErrorCodes.RATE_LIMIT_EXCEEDED,
                    message: 'Too many requests, please try again later'
                }
            }
        })
    );

    app.use('/api/analysis', createAnalysisRoutes(engine.analysisService));

    app.get('/api/health', (req, res) => {
        res.json({
            success: true,
            data: {
                status: 'OK',
                model: engine.model.name,
                timestamp: new Date(),
                uptime: process.uptime()
            }
        });
    });

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

const startServer = () => {
    setupUncaughtExceptionHandling();

    try {
        // Loads the NLP model once for the whole process
        const app = createApp(createAnalysisEngine());

        app.listen(config.server.port, config.server.host, () => {
            logger.info('Server started', {
                port: config.server.port,
                host: config.server.host,
                env: config.server.env,
                nodeVersion: process.version
            });
        });
    } catch (error) {
        logger.error('Server failed to start', error);
        process.exit(1);
    }
};

if (require.main === module) {
    startServer();
}
