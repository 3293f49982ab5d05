/**
 * Error taxonomy shared by the authenticator and every resource client.
 *
 * Each failed call rejects with exactly one of these. `kind` is a string
 * discriminant for callers that prefer a switch over `instanceof`.
 */
export type WatsonErrorKind =
    | 'ConnectionError'
    | 'BadRequest'
    | 'Unauthorized'
    | 'NotFound'
    | 'NotAcceptable'
    | 'UnsupportedMediaType'
    | 'NotModified'
    | 'InternalServerError'
    | 'ServiceUnavailable'
    | 'UnmappedResponse'
    | 'FileReadError'
    | 'InvalidResponse'
    | 'ParameterValidationFailed'
    | 'InvalidApiKey'
    | 'NotAllowed';

export interface WatsonErrorDetails {
    /** HTTP status that produced the error, when there was a response */
    statusCode?: number;
    /** Identifier (customization, speaker, model...) the request was about */
    resourceId?: string;
    /** Message reported by the service in its error body */
    serviceMessage?: string;
}

/**
 * Base class for all client errors.
 */
export abstract class WatsonError extends Error {
    abstract readonly kind: WatsonErrorKind;
    /** Whether repeating the same request later may succeed */
    abstract readonly retryable: boolean;

    readonly statusCode?: number;
    readonly resourceId?: string;
    readonly serviceMessage?: string;

    constructor(message: string, details: WatsonErrorDetails = {}) {
        super(details.serviceMessage ? `${message}: ${details.serviceMessage}` : message);
        this.name = 'WatsonError';
        this.statusCode = details.statusCode;
        this.resourceId = details.resourceId;
        this.serviceMessage = details.serviceMessage;
    }
}

/**
 * Transport-level failure: DNS, TLS, refused connection, timeout or abort.
 */
export class ConnectionError extends WatsonError {
    readonly kind = 'ConnectionError';
    readonly retryable = true;

    constructor(
        public readonly detail: string,
        public readonly code?: string
    ) {
        super(`Connection error: ${detail}`);
        this.name = 'ConnectionError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends WatsonError {
    readonly kind = 'BadRequest';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super(
            details.resourceId
                ? `A required input parameter is null or a specified input parameter or header value is invalid (${details.resourceId})`
                : 'A required input parameter is null or a specified input parameter or header value is invalid',
            { statusCode: 400, ...details }
        );
        this.name = 'BadRequestError';
    }
}

/**
 * Unauthorized error (401/403). Carries the identifier the credentials were refused for.
 */
export class UnauthorizedError extends WatsonError {
    readonly kind = 'Unauthorized';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super(
            details.resourceId
                ? `The specified identifier ${details.resourceId} is invalid for the requesting credentials`
                : 'The request is not authorized for the requesting credentials',
            { statusCode: 401, ...details }
        );
        this.name = 'UnauthorizedError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends WatsonError {
    readonly kind = 'NotFound';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super(
            details.resourceId
                ? `The specified resource ${details.resourceId} was not found`
                : 'The specified resource was not found',
            { statusCode: 404, ...details }
        );
        this.name = 'NotFoundError';
    }
}

/**
 * The request asked for a content type the service cannot produce (406).
 */
export class NotAcceptableError extends WatsonError {
    readonly kind = 'NotAcceptable';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('The request specified an incompatible content type or failed to specify a required sampling rate', {
            statusCode: 406,
            ...details,
        });
        this.name = 'NotAcceptableError';
    }
}

/**
 * The request body used a media type the service does not take (415).
 */
export class UnsupportedMediaTypeError extends WatsonError {
    readonly kind = 'UnsupportedMediaType';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('The request specified an unacceptable media type', { statusCode: 415, ...details });
        this.name = 'UnsupportedMediaTypeError';
    }
}

/**
 * Conditional request short-circuit (304). Nothing changed; there is nothing to do.
 */
export class NotModifiedError extends WatsonError {
    readonly kind = 'NotModified';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('The requested resource has not been modified', { statusCode: 304, ...details });
        this.name = 'NotModifiedError';
    }
}

/**
 * Internal server error (500).
 */
export class InternalServerError extends WatsonError {
    readonly kind = 'InternalServerError';
    readonly retryable = true;

    constructor(details: WatsonErrorDetails = {}) {
        super('The service experienced an internal error', { statusCode: 500, ...details });
        this.name = 'InternalServerError';
    }
}

/**
 * Service unavailable (503).
 */
export class ServiceUnavailableError extends WatsonError {
    readonly kind = 'ServiceUnavailable';
    readonly retryable = true;

    constructor(details: WatsonErrorDetails = {}) {
        super('The service is currently unavailable', { statusCode: 503, ...details });
        this.name = 'ServiceUnavailableError';
    }
}

/**
 * A status the operation does not document.
 */
export class UnmappedResponseError extends WatsonError {
    readonly kind = 'UnmappedResponse';
    readonly retryable = false;

    constructor(
        public readonly status: number,
        details: WatsonErrorDetails = {}
    ) {
        super(`Unexpected response status ${status}`, { ...details, statusCode: status });
        this.name = 'UnmappedResponseError';
    }
}

/**
 * Reading a local upload payload failed.
 */
export class FileReadError extends WatsonError {
    readonly kind = 'FileReadError';
    readonly retryable = false;

    constructor(
        public readonly path: string,
        public readonly detail: string
    ) {
        super(`There was an error reading the file ${path}: ${detail}`);
        this.name = 'FileReadError';
    }
}

/**
 * A success response whose body does not have the documented shape.
 */
export class InvalidResponseError extends WatsonError {
    readonly kind = 'InvalidResponse';
    readonly retryable = false;

    constructor(
        public readonly operation: string,
        public readonly problems: string[],
        statusCode?: number
    ) {
        super(`Invalid ${operation} response: ${problems.join('; ')}`, { statusCode });
        this.name = 'InvalidResponseError';
    }
}

/**
 * IAM rejected the token request parameters (400).
 */
export class ParameterValidationFailedError extends WatsonError {
    readonly kind = 'ParameterValidationFailed';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('Parameter validation failed. Required parameters are missing or parameter values are invalid', {
            statusCode: 400,
            ...details,
        });
        this.name = 'ParameterValidationFailedError';
    }
}

/**
 * IAM did not accept the API key (401).
 */
export class InvalidApiKeyError extends WatsonError {
    readonly kind = 'InvalidApiKey';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('The request did not contain valid authentication information', { statusCode: 401, ...details });
        this.name = 'InvalidApiKeyError';
    }
}

/**
 * The API key is valid but not allowed to obtain a token (403).
 */
export class NotAllowedError extends WatsonError {
    readonly kind = 'NotAllowed';
    readonly retryable = false;

    constructor(details: WatsonErrorDetails = {}) {
        super('The request is valid but the user is not allowed to perform the requested action', {
            statusCode: 403,
            ...details,
        });
        this.name = 'NotAllowedError';
    }
}

export function isWatsonError(error: unknown): error is WatsonError {
    return error instanceof WatsonError;
}
