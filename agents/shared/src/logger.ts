import * as winston from 'winston';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
    service: string;
    level?: string;
    environment?: 'development' | 'production' | 'test';
    silent?: boolean;
}

export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions) {
        const level = options.level || process.env.LOG_LEVEL || (options.environment === 'production' ? 'info' : 'debug');

        const formats = [
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ];

        const transports: winston.transport[] = [];

        if (options.environment !== 'production') {
            transports.push(new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.printf(({ level, message, timestamp, service, environment: _env, ...metadata }) => {
                        let msg = `${timestamp} [${service}] ${level}: ${message}`;
                        if (Object.keys(metadata).length > 0) {
                            msg += ` ${JSON.stringify(metadata)}`;
                        }
                        return msg;
                    })
                )
            }));
        } else {
            transports.push(new winston.transports.Console());
        }

        this.logger = winston.createLogger({
            level,
            silent: options.silent,
            defaultMeta: { service: options.service, environment: options.environment },
            format: winston.format.combine(...formats),
            transports
        });
    }

    public debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta);
    }

    public info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta);
    }

    public warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta);
    }

    public error(message: string, meta?: LogMeta): void {
        this.logger.error(message, meta);
    }

    public getWinstonLogger(): winston.Logger {
        return this.logger;
    }
}

let defaultLogger: Logger | null = null;

export function initLogger(options: LoggerOptions): Logger {
    defaultLogger = new Logger(options);
    return defaultLogger;
}

export function getLogger(): Logger {
    if (!defaultLogger) {
        // Fallback to a default development logger
        defaultLogger = new Logger({ service: 'summary-scraper', environment: 'development' });
    }
    return defaultLogger;
}
