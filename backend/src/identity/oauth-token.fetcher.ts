import { Logger } from '@nestjs/common';
import { ConfigurationError, UpstreamError } from '../common/errors';
import { isRecord, readNumber, readString } from '../common/json';
import type { AuthToken, IdentityApiSettings } from './identity.types';
import type { Clock, TokenFetcher } from './token-cache';

/** Lifetime assumed when the token response carries no `expires_in`. */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

const logger = new Logger('OAuthTokenFetcher');

/**
 * Build a fetcher for the OAuth2 client-credentials grant of the
 * identity-management API.
 */
export function createOAuthTokenFetcher(
  settings: IdentityApiSettings,
  clock: Clock = Date.now,
): TokenFetcher {
  return async (): Promise<AuthToken> => {
    const { baseUrl, clientId, clientSecret } = settings;
    if (!baseUrl || !clientId || !clientSecret) {
      throw new ConfigurationError(
        'Identity-management API is not configured: set IDENTITY_API_URL, IDENTITY_CLIENT_ID and IDENTITY_CLIENT_SECRET',
      );
    }

    const url = `${baseUrl}${settings.tokenPath}?grant_type=client_credentials`;
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString(
      'base64',
    );

    logger.log(
      `Requesting OAuth token for client ${clientId.slice(0, 10)}...`,
    );

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${credentials}`,
        },
        body: '',
        signal: AbortSignal.timeout(settings.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError(
        `Token request failed: ${describeFetchError(error, settings.timeoutMs)}`,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      logger.error(`Token request failed with HTTP ${response.status}`);
      throw new UpstreamError(
        `Token request failed: HTTP ${response.status}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError('Token response was not valid JSON', undefined, {
        cause: error,
      });
    }
    const accessToken = isRecord(body)
      ? readString(body, 'access_token')
      : undefined;
    if (!isRecord(body) || !accessToken) {
      throw new UpstreamError('Token response did not contain an access_token');
    }

    const lifetime =
      readNumber(body, 'expires_in') ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    logger.log(`OAuth token obtained (expires in ${lifetime}s)`);

    return { value: accessToken, expiresAt: clock() + lifetime * 1000 };
  };
}

/**
 * Message for a rejected fetch: timeouts are reported as such, everything
 * else by its own message.
 */
export function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
