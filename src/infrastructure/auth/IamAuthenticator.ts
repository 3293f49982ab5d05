import axios, { AxiosResponse } from 'axios';
import { AccessToken, isTokenExpired, nowInSeconds } from '../../domain/entities/AccessToken';
import {
    ConnectionError,
    InternalServerError,
    InvalidApiKeyError,
    InvalidResponseError,
    NotAllowedError,
    ParameterValidationFailedError,
    UnmappedResponseError,
} from '../../domain/errors/WatsonError';
import { ITokenProvider, RequestOptions } from '../../domain/ports/ITokenProvider';
import { decodeWith, validators } from '../watson/schemas';
import { extractServiceMessage } from '../watson/statusErrors';
import { isHttpsUrl } from '../watson/WatsonHttpClient';

export const DEFAULT_IAM_URL = 'https://iam.cloud.ibm.com/identity/token';
export const DEFAULT_REFRESH_WINDOW_SECONDS = 60;

const GRANT_TYPE = 'urn:ibm:params:oauth:grant-type:apikey';

export interface IamAuthenticatorOptions extends RequestOptions {
    /** Token endpoint; defaults to the public IAM endpoint */
    iamUrl?: string;
    /** Re-exchange the API key when the token is about to expire. Default true */
    autoRefresh?: boolean;
    /** Seconds before `expiration` at which the token counts as expired. Default 60 */
    refreshWindowSeconds?: number;
    debug?: boolean;
    /** Epoch seconds; injectable for tests */
    clock?: () => number;
}

/**
 * Exchanges an API key for an IAM access token. One round trip, no retries.
 */
export async function exchangeApiKey(apiKey: string, options: IamAuthenticatorOptions = {}): Promise<AccessToken> {
    if (!apiKey) {
        throw new Error('Watson API key is required');
    }
    const iamUrl = options.iamUrl ?? DEFAULT_IAM_URL;
    if (!isHttpsUrl(iamUrl)) {
        throw new Error(`IAM URL must be an https URL: ${iamUrl}`);
    }

    if (options.debug) {
        console.log(`[Watson IAM] Requesting access token from ${iamUrl}`);
    }

    let response: AxiosResponse<unknown>;
    try {
        response = await axios.post<unknown>(iamUrl, `grant_type=${GRANT_TYPE}&apikey=${encodeURIComponent(apiKey)}`, {
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                Accept: 'application/json',
            },
            validateStatus: () => true,
            signal: options.signal,
            timeout: options.timeoutMs ?? 0,
        });
    } catch (error) {
        if (axios.isCancel(error)) {
            throw new ConnectionError('Request was aborted', 'ERR_CANCELED');
        }
        if (axios.isAxiosError(error)) {
            throw new ConnectionError(error.message, error.code);
        }
        throw new ConnectionError(error instanceof Error ? error.message : String(error));
    }

    if (options.debug) {
        console.log(`[Watson IAM] POST token -> ${response.status}`);
    }

    return classifyTokenResponse(response);
}

function classifyTokenResponse(response: AxiosResponse<unknown>): AccessToken {
    const details = { serviceMessage: extractServiceMessage(response.data) };
    switch (response.status) {
        case 200:
            return decodeToken(response.data);
        case 400:
            throw new ParameterValidationFailedError(details);
        case 401:
            throw new InvalidApiKeyError(details);
        case 403:
            throw new NotAllowedError(details);
        case 500:
            throw new InternalServerError(details);
        default:
            throw new UnmappedResponseError(response.status, details);
    }
}

const decodeAccessToken = decodeWith(validators.accessToken, 'exchangeApiKey');

function decodeToken(data: unknown): AccessToken {
    try {
        return decodeAccessToken(data);
    } catch (error) {
        if (error instanceof InvalidResponseError) {
            throw new InvalidResponseError(error.operation, error.problems, 200);
        }
        throw error;
    }
}

/**
 * Holds an API key and the access token it was exchanged for, and hands out
 * bearer tokens to the service clients.
 *
 * With auto refresh on, an expired token is replaced before it is returned;
 * concurrent callers share the same in-flight exchange.
 */
export class IamAuthenticator implements ITokenProvider {
    private current: AccessToken;
    private pending?: Promise<AccessToken>;
    private readonly autoRefresh: boolean;
    private readonly refreshWindowSeconds: number;
    private readonly clock: () => number;

    private constructor(
        private readonly apiKey: string,
        token: AccessToken,
        private readonly options: IamAuthenticatorOptions
    ) {
        this.current = token;
        this.autoRefresh = options.autoRefresh ?? true;
        this.refreshWindowSeconds = options.refreshWindowSeconds ?? DEFAULT_REFRESH_WINDOW_SECONDS;
        this.clock = options.clock ?? nowInSeconds;
    }

    /**
     * Performs the first exchange and returns an authenticator owning the token.
     */
    static async create(apiKey: string, options: IamAuthenticatorOptions = {}): Promise<IamAuthenticator> {
        const token = await exchangeApiKey(apiKey, options);
        return new IamAuthenticator(apiKey, token, options);
    }

    get token(): AccessToken {
        return this.current;
    }

    isExpired(now: number = this.clock()): boolean {
        return isTokenExpired(this.current, now, this.refreshWindowSeconds);
    }

    /**
     * Returns the current token, refreshing it first when it has expired.
     * The caller's signal and timeout bound only its own wait; the shared
     * exchange keeps running for the other callers.
     */
    async getAccessToken(options: RequestOptions = {}): Promise<string> {
        if (this.autoRefresh && this.isExpired()) {
            const token = await waitFor(this.refresh(), options);
            return token.access_token;
        }
        return this.current.access_token;
    }

    /**
     * Forces a new exchange. The stored token is only replaced on success.
     */
    async refresh(): Promise<AccessToken> {
        if (!this.pending) {
            this.pending = this.exchange().finally(() => {
                this.pending = undefined;
            });
        }
        return this.pending;
    }

    private async exchange(): Promise<AccessToken> {
        if (this.options.debug) {
            console.log('[Watson IAM] Refreshing access token');
        }
        const token = await exchangeApiKey(this.apiKey, {
            ...this.options,
            // The signal passed to create() belongs to the first exchange only.
            // Callers bound their own wait in getAccessToken().
            signal: undefined,
        });
        this.current = token;
        return token;
    }
}

/**
 * Settles with `promise`, or rejects with ConnectionError once the signal
 * aborts or the timeout elapses, whichever comes first.
 */
function waitFor<T>(promise: Promise<T>, options: RequestOptions): Promise<T> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? 0;
    if (!signal && timeoutMs <= 0) {
        return promise;
    }
    if (signal?.aborted) {
        return Promise.reject(new ConnectionError('Request was aborted', 'ERR_CANCELED'));
    }

    return new Promise<T>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined;
        const onAbort = () => {
            cleanup();
            reject(new ConnectionError('Request was aborted', 'ERR_CANCELED'));
        };
        const cleanup = () => {
            if (timer) {
                clearTimeout(timer);
            }
            signal?.removeEventListener('abort', onAbort);
        };

        if (timeoutMs > 0) {
            timer = setTimeout(() => {
                cleanup();
                reject(new ConnectionError(`timeout of ${timeoutMs}ms exceeded`, 'ECONNABORTED'));
            }, timeoutMs);
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        promise.then(
            (value) => {
                cleanup();
                resolve(value);
            },
            (error: unknown) => {
                cleanup();
                reject(error);
            }
        );
    });
}
