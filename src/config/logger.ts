import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const isProduction = process.env.NODE_ENV === 'production';

/**
 * Logger Configuration
 *
 * Structured JSON logger for the answer screener. Pretty-printed outside
 * production; agent stages, cache traffic and ranking fan-out all log
 * through it.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: isProduction ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
