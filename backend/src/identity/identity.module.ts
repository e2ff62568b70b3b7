import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  IDENTITY_API_SETTINGS,
  IdentityApiClient,
} from './identity-api.client';
import { createOAuthTokenFetcher } from './oauth-token.fetcher';
import { TokenCache } from './token-cache';
import type { IdentityApiSettings } from './identity.types';

/**
 * Identity-management integration.
 *
 * - IDENTITY_API_SETTINGS: connection settings read from the environment
 * - TokenCache: OAuth client-credentials token, shared by all requests
 * - IdentityApiClient: one REST call per tool invocation
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: IDENTITY_API_SETTINGS,
      useFactory: (configService: ConfigService): IdentityApiSettings => ({
        baseUrl: configService.get<string>('IDENTITY_API_URL'),
        clientId: configService.get<string>('IDENTITY_CLIENT_ID'),
        clientSecret: configService.get<string>('IDENTITY_CLIENT_SECRET'),
        tokenPath: configService.get<string>(
          'IDENTITY_TOKEN_PATH',
          '/identityiq/oauth2/token',
        ),
        refreshPath: configService.get<string>(
          'IDENTITY_REFRESH_PATH',
          '/identityiq/plugin/rest/RefreshIdentity/refreshIdentitySingleUser',
        ),
        timeoutMs: configService.get<number>('IDENTITY_TIMEOUT_MS', 10000),
      }),
      inject: [ConfigService],
    },
    {
      provide: TokenCache,
      useFactory: (settings: IdentityApiSettings) =>
        new TokenCache(createOAuthTokenFetcher(settings)),
      inject: [IDENTITY_API_SETTINGS],
    },
    IdentityApiClient,
  ],
  exports: [IdentityApiClient, TokenCache],
})
export class IdentityModule {}
