/**
 * ITokenProvider - Port for anything that can hand out a bearer token.
 * Implementations: IamAuthenticator
 */
export interface ITokenProvider {
    /**
     * Returns the bearer token to send with the next request. The request's
     * signal and timeout also bound any wait for a new token.
     */
    getAccessToken(options?: RequestOptions): Promise<string>;
}

/**
 * Per-call transport controls, passed straight through to the HTTP layer.
 */
export interface RequestOptions {
    /** Aborts the in-flight request */
    signal?: AbortSignal;
    /** Request timeout in milliseconds; 0 disables it */
    timeoutMs?: number;
}
