import { isRecord, readString } from '../../common/json';
import type { ToolResult } from '../../identity/identity.types';

/**
 * Reply used when the follow-up completion comes back without text.
 * Mirrors what the assistant is asked to say after a tool run.
 */
export function formatToolResultReply(
  toolName: string,
  result: ToolResult,
): string {
  const label = toolName.replace(/_/g, ' ');

  if (result.status === 'error') {
    const reason =
      typeof result.payload === 'string'
        ? result.payload
        : (readString(result.payload, 'message') ?? 'unknown error');
    return `I wasn't able to complete the ${label} request: ${reason}`;
  }

  if (typeof result.payload === 'string') {
    return result.payload;
  }

  const payload = result.payload;
  const message = readString(payload, 'message') ?? `The ${label} completed.`;
  const lines = [message];

  const taskStatus = readString(payload, 'task_status');
  if (taskStatus) {
    lines.push(`Task Status: ${taskStatus}`);
  }
  if (toolName === 'trigger_identity_refresh') {
    lines.push(
      'Please wait 2-3 minutes and try accessing the application again.',
    );
  }
  const upstream = payload.identity_response;
  if (isRecord(upstream) && Object.keys(upstream).length > 0) {
    lines.push(
      `Identity API Response:\n${JSON.stringify(upstream, null, 2)}`,
    );
  }

  return lines.join('\n\n');
}
