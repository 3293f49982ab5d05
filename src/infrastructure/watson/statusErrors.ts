import {
    BadRequestError,
    InternalServerError,
    NotAcceptableError,
    NotFoundError,
    NotModifiedError,
    ServiceUnavailableError,
    UnauthorizedError,
    UnsupportedMediaTypeError,
    WatsonError,
    WatsonErrorDetails,
} from '../../domain/errors/WatsonError';
import { DocumentedErrorStatus } from './WatsonOperation';

/**
 * Maps a documented error status to its named error.
 */
export function errorForStatus(status: DocumentedErrorStatus, details: WatsonErrorDetails = {}): WatsonError {
    switch (status) {
        case 304:
            return new NotModifiedError(details);
        case 400:
            return new BadRequestError(details);
        case 401:
        case 403:
            return new UnauthorizedError({ ...details, statusCode: status });
        case 404:
            return new NotFoundError(details);
        case 406:
            return new NotAcceptableError(details);
        case 415:
            return new UnsupportedMediaTypeError(details);
        case 500:
            return new InternalServerError(details);
        case 503:
            return new ServiceUnavailableError(details);
    }
}

/**
 * Pulls the service's own message out of an error body, if it has one.
 * Bodies may be parsed JSON, raw text or (for audio endpoints) a Buffer.
 */
export function extractServiceMessage(data: unknown): string | undefined {
    const body = Buffer.isBuffer(data) ? parseJson(data.toString('utf-8')) : typeof data === 'string' ? parseJson(data) : data;
    if (!isRecord(body)) {
        return undefined;
    }
    for (const key of ['error', 'message', 'errorMessage']) {
        const value = body[key];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
    }
    return undefined;
}

function parseJson(text: string): unknown {
    if (!text.trim().startsWith('{')) {
        return undefined;
    }
    try {
        return JSON.parse(text);
    } catch {
        // Not every error body is JSON; there is simply no message to report
        return undefined;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
