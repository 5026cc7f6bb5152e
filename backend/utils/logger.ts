import fs from 'fs';
import path from 'path';
import { config } from '../config/app';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

class Logger {
    private logDir: string;
    private logFile: string;
    private minLevel: LogLevel;
    private toFile: boolean;

    constructor() {
        this.logDir = config.logging.directory;
        this.logFile = path.join(this.logDir, 'app.log');
        this.minLevel = isLogLevel(config.logging.level) ? config.logging.level : 'info';
        this.toFile = config.logging.toFile;

        if (this.toFile) {
            this.ensureLogDir();
        }
    }

    private ensureLogDir(): void {
        if (!fs.existsSync(this.logDir)) {
            fs.mkdirSync(this.logDir, { recursive: true });
        }
    }

    private serializeMeta(meta: unknown): unknown {
        if (meta instanceof Error) {
            return { name: meta.name, message: meta.message, stack: meta.stack };
        }
        return meta;
    }

    private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

        if (meta !== undefined) {
            try {
                logMessage += ` ${JSON.stringify(this.serializeMeta(meta))}`;
            } catch (error) {
                logMessage += ` [Meta serialization failed: ${String(error)}]`;
            }
        }

        return logMessage;
    }

    private writeToFile(message: string): void {
        if (this.toFile) {
            fs.appendFileSync(this.logFile, message + '\n');
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
    }

    debug(message: string, meta?: unknown): void {
        if (this.enabled('debug')) {
            const formattedMessage = this.formatMessage('debug', message, meta);
            console.debug(formattedMessage);
            this.writeToFile(formattedMessage);
        }
    }

    info(message: string, meta?: unknown): void {
        if (this.enabled('info')) {
            const formattedMessage = this.formatMessage('info', message, meta);
            console.info(formattedMessage);
            this.writeToFile(formattedMessage);
        }
    }

    warn(message: string, meta?: unknown): void {
        if (this.enabled('warn')) {
            const formattedMessage = this.formatMessage('warn', message, meta);
            console.warn(formattedMessage);
            this.writeToFile(formattedMessage);
        }
    }

    error(message: string, meta?: unknown): void {
        if (this.enabled('error')) {
            const formattedMessage = this.formatMessage('error', message, meta);
            console.error(formattedMessage);
            this.writeToFile(formattedMessage);
        }
    }
}

// Shared instance
export const logger = new Logger();
