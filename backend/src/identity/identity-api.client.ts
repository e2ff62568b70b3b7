import { Inject, Injectable, Logger } from '@nestjs/common';
import { isSupportBotError, describeError } from '../common/errors';
import { isRecord, readString } from '../common/json';
import { describeFetchError } from './oauth-token.fetcher';
import { TokenCache } from './token-cache';
import { errorResult, successResult } from './identity.types';
import type {
  IdentityApiSettings,
  IdentityOperation,
  IdentityOperationArgs,
  ToolResult,
} from './identity.types';

export const IDENTITY_API_SETTINGS = Symbol('IDENTITY_API_SETTINGS');

export const PLACEHOLDER_MESSAGE =
  'This is a placeholder - API endpoint not yet configured';

type OperationHandlers = {
  [Op in IdentityOperation]: (
    args: IdentityOperationArgs[Op],
  ) => Promise<ToolResult>;
};

/**
 * Client for the identity-management REST API.
 *
 * Each invocation performs at most one token fetch (through {@link TokenCache})
 * and exactly one REST call. Failures come back as error results; nothing is
 * retried here.
 *
 * Only `trigger_identity_refresh` has a backing endpoint. The other two
 * operations return a fixed placeholder result without touching the network.
 */
@Injectable()
export class IdentityApiClient {
  private readonly logger = new Logger(IdentityApiClient.name);

  private readonly handlers: OperationHandlers = {
    trigger_identity_refresh: (args) => this.triggerRefresh(args),
    check_request_status: (args) => this.getRequestStatus(args),
    get_identity_info: (args) => this.getIdentity(args),
  };

  constructor(
    @Inject(IDENTITY_API_SETTINGS)
    private readonly settings: IdentityApiSettings,
    private readonly tokenCache: TokenCache,
  ) {
    this.logger.log(
      `Identity API client configured with base URL: ${settings.baseUrl ?? '(none)'}`,
    );
  }

  /**
   * Run one identity operation. Never throws.
   */
  async invoke<Op extends IdentityOperation>(
    operation: Op,
    args: IdentityOperationArgs[Op],
  ): Promise<ToolResult> {
    this.logger.debug(`Invoking ${operation} with ${JSON.stringify(args)}`);
    try {
      return await this.handlers[operation](args);
    } catch (error) {
      this.logger.error(`${operation} failed: ${describeError(error)}`);
      if (isSupportBotError(error)) {
        return errorResult(error.kind, error.message);
      }
      return errorResult('upstream', describeError(error));
    }
  }

  isConfigured(): boolean {
    const { baseUrl, clientId, clientSecret } = this.settings;
    return Boolean(baseUrl && clientId && clientSecret);
  }

  private async triggerRefresh({
    user_id,
    reason,
  }: IdentityOperationArgs['trigger_identity_refresh']): Promise<ToolResult> {
    const { baseUrl } = this.settings;
    if (!baseUrl || !this.isConfigured()) {
      return errorResult(
        'configuration',
        'Identity-management API is not configured: set IDENTITY_API_URL, IDENTITY_CLIENT_ID and IDENTITY_CLIENT_SECRET',
      );
    }

    this.logger.log(
      `Refreshing identity for user ${user_id}${reason ? ` (${reason})` : ''}`,
    );

    const token = await this.tokenCache.get();
    const url = `${baseUrl}${this.settings.refreshPath}?userId=${encodeURIComponent(user_id)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
        },
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      return errorResult(
        'upstream',
        `Identity refresh request failed: ${describeFetchError(error, this.settings.timeoutMs)}`,
      );
    }

    this.logger.log(`Identity API responded with HTTP ${response.status}`);

    if (!response.ok) {
      if (response.status === 401) {
        // The next invocation fetches a fresh token.
        this.tokenCache.invalidate();
      }
      const details = await this.readErrorBody(response);
      return errorResult(
        'upstream',
        `Identity API error: HTTP ${response.status}${details ? ` - ${details}` : ''}`,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      return errorResult(
        'upstream',
        'Identity API returned a response that was not valid JSON',
      );
    }
    const body = isRecord(data) ? data : {};

    return successResult({
      success: readString(body, 'status') === 'success',
      user_id: readString(body, 'userId') ?? user_id,
      message:
        readString(body, 'message') ??
        `Identity refresh triggered for ${user_id}`,
      task_status: readString(body, 'taskStatus') ?? 'Unknown',
      identity_response: body,
      api_endpoint: url,
      timestamp: new Date().toISOString(),
    });
  }

  private getRequestStatus({
    request_id,
  }: IdentityOperationArgs['check_request_status']): Promise<ToolResult> {
    this.logger.log(`check_request_status for ${request_id} (placeholder)`);
    return Promise.resolve(
      errorResult('configuration', {
        placeholder: true,
        success: false,
        message: PLACEHOLDER_MESSAGE,
        request_id,
        note: 'check_request_status has no identity-management endpoint configured',
      }),
    );
  }

  private getIdentity({
    user_id,
  }: IdentityOperationArgs['get_identity_info']): Promise<ToolResult> {
    this.logger.log(`get_identity_info for ${user_id} (placeholder)`);
    return Promise.resolve(
      errorResult('configuration', {
        placeholder: true,
        success: false,
        message: PLACEHOLDER_MESSAGE,
        user_id,
        note: 'get_identity_info has no identity-management endpoint configured',
      }),
    );
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      return (await response.text()).trim().slice(0, 500);
    } catch {
      return '';
    }
  }
}
