import { Logger } from '@nestjs/common';
import type { AuthToken } from './identity.types';

export type TokenFetcher = () => Promise<AuthToken>;
export type Clock = () => number;

/** Tokens this close to expiry are treated as already expired. */
export const TOKEN_EXPIRY_SKEW_MS = 30_000;

/**
 * In-memory bearer token cache.
 *
 * A token is handed out only while its expiry lies in the future (minus
 * {@link TOKEN_EXPIRY_SKEW_MS}). Concurrent callers that find the cache empty
 * share a single in-flight fetch.
 */
export class TokenCache {
  private readonly logger = new Logger(TokenCache.name);
  private token: AuthToken | null = null;
  private pending: Promise<AuthToken> | null = null;

  constructor(
    private readonly fetchToken: TokenFetcher,
    private readonly clock: Clock = Date.now,
  ) {}

  async get(): Promise<string> {
    if (this.token && this.isFresh(this.token)) {
      return this.token.value;
    }

    if (!this.pending) {
      this.logger.debug('No usable token cached, fetching a new one');
      this.pending = this.refresh();
    }

    const token = await this.pending;
    return token.value;
  }

  invalidate(): void {
    this.token = null;
  }

  private async refresh(): Promise<AuthToken> {
    try {
      const token = await this.fetchToken();
      this.token = token;
      return token;
    } finally {
      this.pending = null;
    }
  }

  private isFresh(token: AuthToken): boolean {
    return token.expiresAt - TOKEN_EXPIRY_SKEW_MS > this.clock();
  }
}
