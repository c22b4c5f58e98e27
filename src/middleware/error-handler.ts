import { logger } from '../config/logger';
import { errorMessage } from '../errors';

// The slice of express's Response the handler writes to
export interface ErrorResponse {
    headersSent: boolean;
    status(code: number): ErrorResponse;
    json(body: unknown): unknown;
}

function clientErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }

    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Last middleware in the chain. Turns anything the routes or body parser
 * throw into a JSON body.
 */
export function errorHandler(
    error: unknown,
    req: unknown,
    res: ErrorResponse,
    next: (error?: unknown) => void
): void {
    if (res.headersSent) {
        next(error);
        return;
    }

    const status = clientErrorStatus(error);

    if (typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed') {
        res.status(400).json({
            error: 'InvalidJSON',
            message: 'Request body is not valid JSON'
        });
        return;
    }

    if (status !== undefined) {
        res.status(status).json({
            error: 'BadRequest',
            message: errorMessage(error)
        });
        return;
    }

    logger.error({ err: error }, 'Unhandled request error');
    res.status(500).json({
        error: 'InternalServerError',
        message: 'An unexpected error occurred'
    });
}
