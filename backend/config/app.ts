import path from 'path';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test';

export const MIME_TYPES = {
    pdf: 'application/pdf',
    docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
} as const;

const allowedMimeTypes: readonly string[] = [MIME_TYPES.pdf, MIME_TYPES.docx];

// Application configuration
export const config = {
    // Runtime environment
    server: {
        port: parseInt(process.env.PORT || '4000', 10),
        host: process.env.HOST || '0.0.0.0',
        env,
        isProduction: env === 'production',
        isDevelopment: env === 'development',
        isTest,
    },

    // Uploaded document limits
    upload: {
        maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '5242880', 10), // 5MB
        allowedMimeTypes,
    },

    // Logging
    logging: {
        directory: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
        level: process.env.LOG_LEVEL || (isTest ? 'error' : 'info'),
        toFile: !isTest && process.env.LOG_TO_FILE !== 'false',
    },

    // Entity recognition model
    nlp: {
        model: process.env.NLP_MODEL || 'compromise',
    },

    // Suggestion post-processor
    ai: {
        enableSuggestions: process.env.ENABLE_AI_SUGGESTIONS !== 'false',
        serviceUrl: process.env.AI_SUGGESTION_URL || '',
        timeoutMs: parseInt(process.env.AI_TIMEOUT_MS || '30000', 10),
    },

    // API rate limiting
    rateLimit: {
        windowMs: parseInt(process.env.RATE_LIMIT_WINDOW || '900000', 10), // 15 minutes
        max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    },

    // CORS
    cors: {
        origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
        credentials: true,
    },
};

export type AppConfig = typeof config;

export default config;
