import { isAxiosError } from 'axios';
import { API_BASE } from './chat-api';

const NETWORK_ERROR_CODES = new Set(['ERR_NETWORK', 'ECONNREFUSED']);

/**
 * Text shown in the chat for a failed request.
 *
 * - backend unreachable
 * - request sent but no response (timeouts land here)
 * - HTTP error, using the body's `detail` or `message` when present
 * - anything else
 */
export function describeChatError(error: unknown): string {
  if (isAxiosError(error)) {
    if (
      (error.code && NETWORK_ERROR_CODES.has(error.code)) ||
      error.message === 'Network Error'
    ) {
      return `Cannot connect to backend server. Please make sure the backend is running on ${API_BASE}`;
    }
    if (error.response) {
      return (
        readErrorDetail(error.response.data) ??
        `Server error: ${error.response.status}`
      );
    }
    if (error.request) {
      return 'No response from server. The backend may be down or unreachable.';
    }
  }

  if (error instanceof Error && error.message) {
    return error.message;
  }
  return 'An unexpected error occurred.';
}

function readErrorDetail(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  for (const key of ['detail', 'message']) {
    const value: unknown = Reflect.get(data, key);
    const text = toText(value);
    if (text) {
      return text;
    }
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (Array.isArray(value)) {
    const parts = value.filter(
      (item): item is string => typeof item === 'string' && item.length > 0,
    );
    return parts.length > 0 ? parts.join('; ') : undefined;
  }
  return undefined;
}
