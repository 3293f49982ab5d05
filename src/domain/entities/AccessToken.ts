/**
 * AccessToken Domain Entity
 *
 * IAM token record, field names exactly as the identity endpoint returns them.
 */
export interface AccessToken {
    access_token: string;
    refresh_token: string;
    token_type: string;
    /** Lifetime in seconds from issue */
    expires_in: number;
    /** Absolute expiry, epoch seconds */
    expiration: number;
    scope?: string;
    delegated_refresh_token?: string;
}

/**
 * Whether the token is expired, or will be within `windowSeconds`.
 */
export function isTokenExpired(token: AccessToken, nowSeconds: number, windowSeconds: number = 0): boolean {
    return token.expiration - windowSeconds <= nowSeconds;
}

export function nowInSeconds(): number {
    return Math.floor(Date.now() / 1000);
}
