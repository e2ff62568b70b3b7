import { z } from 'zod';
import type {
  IdentityOperation,
  IdentityOperationArgs,
} from '../identity/identity.types';

/**
 * Static description of one callable tool.
 */
export interface ToolDefinition {
  name: IdentityOperation;
  description: string;
  schema: z.AnyZodObject;
}

const userId = z
  .string()
  .trim()
  .min(1)
  .describe(
    "The username/user_id extracted from the message (e.g. 'Ram', 'Aaron.Nichols', 'John.Smith'). Look for names mentioned in the message.",
  );

const triggerIdentityRefreshSchema = z.object({
  user_id: userId,
  reason: z
    .string()
    .optional()
    .describe(
      "Brief reason why the refresh is needed (e.g. 'Dynamic access not provisioned', 'Approved but can't access')",
    ),
});

const checkRequestStatusSchema = z.object({
  request_id: z
    .string()
    .trim()
    .min(1)
    .describe('The access request ID or user ID to check'),
});

const getIdentityInfoSchema = z.object({
  user_id: userId.describe('The user ID to get information about'),
});

/**
 * Argument schemas keyed by operation, typed against the identity client's
 * argument map so a parsed value can be handed straight to it.
 */
export const TOOL_SCHEMAS: {
  [Op in IdentityOperation]: z.ZodType<IdentityOperationArgs[Op]>;
} = {
  trigger_identity_refresh: triggerIdentityRefreshSchema,
  check_request_status: checkRequestStatusSchema,
  get_identity_info: getIdentityInfoSchema,
};

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'trigger_identity_refresh',
    description:
      "Trigger an identity refresh for a user when they can't access something after approval, colleagues have access but they don't, or dynamic/role-based access was not provisioned. Extract the username from the user's message.",
    schema: triggerIdentityRefreshSchema,
  },
  {
    name: 'check_request_status',
    description:
      'Check the status of an access request in the identity-management system.',
    schema: checkRequestStatusSchema,
  },
  {
    name: 'get_identity_info',
    description:
      'Get detailed identity information for a user from the identity-management system.',
    schema: getIdentityInfoSchema,
  },
];
