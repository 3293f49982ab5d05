import FormData from 'form-data';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Statuses the executor knows how to turn into a named error.
 */
export type DocumentedErrorStatus = 304 | 400 | 401 | 403 | 404 | 406 | 415 | 500 | 503;

export type RequestPayload =
    | { kind: 'json'; value: unknown }
    | { kind: 'multipart'; form: FormData }
    | { kind: 'audio'; data: Buffer; contentType: string };

export type ResponseShape<T> =
    | { kind: 'json'; decode: (data: unknown) => T }
    | { kind: 'binary'; accept?: string; decode: (data: Buffer) => T }
    | { kind: 'empty'; value: T };

/**
 * The identifier an error is about, and the statuses that report it.
 */
export interface OffendingResource {
    id: string;
    on: readonly DocumentedErrorStatus[];
}

export type QueryPairs = ReadonlyArray<readonly [string, string | undefined]>;

/**
 * Everything needed to perform one remote call. Built fresh per call by the
 * operation catalogs and run by WatsonHttpClient.execute.
 */
export interface WatsonOperation<T> {
    /** Operation name used in logs and InvalidResponseError */
    name: string;
    method: HttpMethod;
    /** Path relative to the service URL, with `{param}` placeholders */
    path: string;
    pathParams?: Readonly<Record<string, string>>;
    /** Sent in this order; undefined values are skipped */
    query?: QueryPairs;
    payload?: RequestPayload;
    success: readonly number[];
    /** Error statuses this operation documents; anything else is unmapped */
    errors: readonly DocumentedErrorStatus[];
    /** Identifier reported with the errors listed in `on` */
    resource?: OffendingResource;
    response: ResponseShape<T>;
}

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/**
 * Substitutes `{param}` placeholders with percent-encoded values.
 */
export function resolvePath(template: string, params: Readonly<Record<string, string>> = {}): string {
    return template.replace(PLACEHOLDER, (_match, name: string) => {
        const value = params[name];
        if (value === undefined) {
            throw new Error(`Missing path parameter "${name}" for ${template}`);
        }
        // URL resolution collapses dot segments, even percent-encoded ones
        if (value === '' || value === '.' || value === '..') {
            throw new Error(`Invalid path parameter "${name}" for ${template}: ${JSON.stringify(value)}`);
        }
        return encodeURIComponent(value);
    });
}

/**
 * Serializes query pairs in order, percent-encoding keys and values
 * (spaces become %20).
 */
export function buildQueryString(query: QueryPairs = []): string {
    return query
        .filter((pair): pair is readonly [string, string] => pair[1] !== undefined)
        .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
        .join('&');
}

/**
 * Relative request URL for an operation: resolved path plus query string.
 */
export function buildRequestPath(operation: Pick<WatsonOperation<unknown>, 'path' | 'pathParams' | 'query'>): string {
    const path = resolvePath(operation.path, operation.pathParams);
    const query = buildQueryString(operation.query);
    return query ? `${path}?${query}` : path;
}

export const emptyResponse: ResponseShape<void> = { kind: 'empty', value: undefined };
