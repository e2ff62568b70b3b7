import type { ErrorKind } from '../common/errors';

/**
 * Operations the assistant may run against the identity-management system.
 */
export const IDENTITY_OPERATIONS = [
  'trigger_identity_refresh',
  'check_request_status',
  'get_identity_info',
] as const;

export type IdentityOperation = (typeof IDENTITY_OPERATIONS)[number];

export interface IdentityOperationArgs {
  trigger_identity_refresh: { user_id: string; reason?: string };
  check_request_status: { request_id: string };
  get_identity_info: { user_id: string };
}

export type ToolPayload = string | Record<string, unknown>;

export type ToolResult =
  | { status: 'success'; payload: ToolPayload }
  | { status: 'error'; errorKind: ErrorKind; payload: ToolPayload };

export interface AuthToken {
  value: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Connection settings for the identity-management REST API.
 * `baseUrl`, `clientId` and `clientSecret` are optional so the service can
 * start without them; calls then fail with a configuration result.
 */
export interface IdentityApiSettings {
  baseUrl?: string;
  clientId?: string;
  clientSecret?: string;
  tokenPath: string;
  refreshPath: string;
  timeoutMs: number;
}

export function isIdentityOperation(name: string): name is IdentityOperation {
  return IDENTITY_OPERATIONS.some((operation) => operation === name);
}

export function successResult(payload: ToolPayload): ToolResult {
  return { status: 'success', payload };
}

export function errorResult(
  errorKind: ErrorKind,
  payload: ToolPayload,
): ToolResult {
  return { status: 'error', errorKind, payload };
}
