/**
 * Token Cache
 *
 * Caches OAuth2 access tokens between requests and scenarios.
 */

export interface CachedToken {
	accessToken: string;
	tokenType: string;
	/** Epoch milliseconds */
	expiresAt: number;
}

export interface TokenCache {
	get(key: string): CachedToken | undefined;
	set(key: string, token: CachedToken): void;
	remove(key: string): void;
	clear(): void;
}

/** Tokens are treated as expired this long before their real expiry */
export const TOKEN_REFRESH_BUFFER_MS = 300_000;

/**
 * In-memory token cache.
 */
export class MemoryTokenCache implements TokenCache {
	private readonly tokens = new Map<string, CachedToken>();

	constructor(
		private readonly refreshBufferMs: number = TOKEN_REFRESH_BUFFER_MS,
		private readonly now: () => number = Date.now
	) {}

	get(key: string): CachedToken | undefined {
		const token = this.tokens.get(key);
		if (!token) {
			return undefined;
		}
		if (this.now() + this.refreshBufferMs >= token.expiresAt) {
			this.tokens.delete(key);
			return undefined;
		}
		return token;
	}

	set(key: string, token: CachedToken): void {
		this.tokens.set(key, token);
	}

	remove(key: string): void {
		this.tokens.delete(key);
	}

	clear(): void {
		this.tokens.clear();
	}
}

/**
 * Process-wide cache used when a scenario is not given its own.
 */
export const defaultTokenCache: TokenCache = new MemoryTokenCache();

export function oauth2CacheKey(clientId: string, tokenUrl: string): string {
	return `oauth2:${clientId}:${tokenUrl}`;
}
