import type { IdentityOperation } from '../../identity/identity.types';

/**
 * Response body for POST /chat.
 */
export interface ChatResponseDto {
  response: string;
  action_taken: IdentityOperation | null;
}
