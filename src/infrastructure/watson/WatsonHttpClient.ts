import axios, { AxiosInstance, AxiosResponse } from 'axios';
import https from 'https';
import { ConnectionError, InvalidResponseError, UnmappedResponseError, WatsonError } from '../../domain/errors/WatsonError';
import { ITokenProvider, RequestOptions } from '../../domain/ports/ITokenProvider';
import { errorForStatus, extractServiceMessage } from './statusErrors';
import {
    buildRequestPath,
    DocumentedErrorStatus,
    OffendingResource,
    RequestPayload,
    ResponseShape,
    WatsonOperation,
} from './WatsonOperation';

/**
 * A fixed bearer token, or a provider asked for one before every request.
 */
export type TokenSource = string | ITokenProvider;

export interface WatsonHttpClientOptions {
    /** Service instance URL; must be https */
    serviceUrl: string;
    token: TokenSource;
    /** Default request timeout in milliseconds; 0 disables it */
    timeoutMs?: number;
    /** Log method, path and status of every call */
    debug?: boolean;
    /** Prefix for debug logs */
    label?: string;
}

/**
 * Generic executor for Watson operations.
 *
 * Owns one axios instance (and its keep-alive agent) for the lifetime of the
 * client. Every operation goes through execute(): build the request, send it,
 * classify the status, then decode the body or throw the matching WatsonError.
 */
export class WatsonHttpClient {
    readonly serviceUrl: string;
    private readonly http: AxiosInstance;
    private readonly tokenSource: TokenSource;
    private readonly timeoutMs: number;
    private readonly debug: boolean;
    private readonly label: string;

    constructor(options: WatsonHttpClientOptions) {
        if (!options.serviceUrl) {
            throw new Error('Watson service URL is required');
        }
        if (!isHttpsUrl(options.serviceUrl)) {
            throw new Error(`Watson service URL must be an https URL: ${options.serviceUrl}`);
        }
        if (typeof options.token === 'string' && !options.token) {
            throw new Error('Watson access token is required');
        }

        this.serviceUrl = options.serviceUrl;
        this.tokenSource = options.token;
        this.timeoutMs = options.timeoutMs ?? 0;
        this.debug = options.debug ?? false;
        this.label = options.label ?? 'Watson HTTP';
        this.http = axios.create({
            baseURL: options.serviceUrl,
            httpsAgent: new https.Agent({ keepAlive: true }),
            // Status classification happens in classify(), not in axios
            validateStatus: () => true,
            maxRedirects: 0,
        });
    }

    /**
     * Runs one operation and resolves with its decoded result.
     */
    async execute<T>(operation: WatsonOperation<T>, options: RequestOptions = {}): Promise<T> {
        const url = buildRequestPath(operation);
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;
        const token = await this.resolveToken({ signal: options.signal, timeoutMs });

        const headers: Record<string, string> = {
            Authorization: `Bearer ${token}`,
            Accept: acceptHeader(operation.response),
        };
        const data = operation.payload ? attachPayload(operation.payload, headers) : undefined;

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                method: operation.method,
                url,
                headers,
                data,
                responseType: operation.response.kind === 'binary' ? 'arraybuffer' : 'json',
                signal: options.signal,
                timeout: timeoutMs,
            });
        } catch (error) {
            throw toConnectionError(error);
        }

        if (this.debug) {
            console.log(`[${this.label}] ${operation.method} ${url} -> ${response.status}`);
        }

        return classify(operation, response);
    }

    private async resolveToken(options: RequestOptions): Promise<string> {
        if (typeof this.tokenSource === 'string') {
            return this.tokenSource;
        }
        return this.tokenSource.getAccessToken(options);
    }
}

export function isHttpsUrl(value: string): boolean {
    try {
        return new URL(value).protocol === 'https:';
    } catch {
        // Unparseable URLs are not https URLs
        return false;
    }
}

function acceptHeader(shape: ResponseShape<unknown>): string {
    if (shape.kind === 'binary') {
        return shape.accept ?? '*/*';
    }
    return 'application/json';
}

function attachPayload(payload: RequestPayload, headers: Record<string, string>): unknown {
    switch (payload.kind) {
        case 'json':
            headers['Content-Type'] = 'application/json';
            return JSON.stringify(payload.value);
        case 'multipart':
            Object.assign(headers, payload.form.getHeaders());
            return payload.form;
        case 'audio':
            headers['Content-Type'] = payload.contentType;
            return payload.data;
    }
}

function classify<T>(operation: WatsonOperation<T>, response: AxiosResponse<unknown>): T {
    const status = response.status;

    if (operation.success.includes(status)) {
        return decodeBody(operation, response.data, status);
    }

    const serviceMessage = extractServiceMessage(response.data);
    const documented = operation.errors.find((candidate) => candidate === status);
    if (documented !== undefined) {
        throw errorForStatus(documented, { resourceId: offendingId(operation.resource, documented), serviceMessage });
    }
    throw new UnmappedResponseError(status, { serviceMessage });
}

function offendingId(resource: OffendingResource | undefined, status: DocumentedErrorStatus): string | undefined {
    if (resource && resource.on.includes(status)) {
        return resource.id;
    }
    return undefined;
}

function decodeBody<T>(operation: WatsonOperation<T>, data: unknown, status: number): T {
    const shape = operation.response;
    switch (shape.kind) {
        case 'json':
            try {
                return shape.decode(data);
            } catch (error) {
                if (error instanceof InvalidResponseError && error.statusCode === undefined) {
                    throw new InvalidResponseError(error.operation, error.problems, status);
                }
                throw error;
            }
        case 'binary':
            return shape.decode(toBuffer(data, operation.name, status));
        case 'empty':
            return shape.value;
    }
}

function toBuffer(data: unknown, operation: string, status: number): Buffer {
    if (Buffer.isBuffer(data)) {
        return data;
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data);
    }
    if (typeof data === 'string') {
        return Buffer.from(data, 'binary');
    }
    throw new InvalidResponseError(operation, ['expected a binary body'], status);
}

function toConnectionError(error: unknown): WatsonError {
    if (error instanceof WatsonError) {
        return error;
    }
    if (axios.isCancel(error)) {
        return new ConnectionError('Request was aborted', 'ERR_CANCELED');
    }
    if (axios.isAxiosError(error)) {
        return new ConnectionError(error.message, error.code);
    }
    return new ConnectionError(error instanceof Error ? error.message : String(error));
}
