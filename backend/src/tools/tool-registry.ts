import { Injectable, Logger } from '@nestjs/common';
import { tool, type StructuredToolInterface } from '@langchain/core/tools';
import { describeError, ValidationError } from '../common/errors';
import { IdentityApiClient } from '../identity/identity-api.client';
import {
  IDENTITY_OPERATIONS,
  errorResult,
  isIdentityOperation,
} from '../identity/identity.types';
import type {
  IdentityOperation,
  ToolResult,
} from '../identity/identity.types';
import {
  TOOL_DEFINITIONS,
  TOOL_SCHEMAS,
  type ToolDefinition,
} from './tool-definitions';

/**
 * Maps tool names to identity operations.
 *
 * Holds no mutable state, so a single instance is shared by the chat
 * orchestrator and the MCP server.
 */
@Injectable()
export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);

  constructor(private readonly identityClient: IdentityApiClient) {}

  list(): readonly ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  names(): IdentityOperation[] {
    return [...IDENTITY_OPERATIONS];
  }

  /**
   * Validate arguments and run the named tool. Never throws: unknown names
   * and invalid arguments come back as validation results without any
   * network call.
   */
  async dispatch(name: string, args: unknown): Promise<ToolResult> {
    if (!isIdentityOperation(name)) {
      this.logger.warn(`Rejected unknown tool "${name}"`);
      const error = new ValidationError(
        `Unknown tool "${name}". Available tools: ${IDENTITY_OPERATIONS.join(', ')}`,
      );
      return errorResult(error.kind, error.message);
    }

    try {
      return await this.dispatchOperation(name, args);
    } catch (error) {
      this.logger.error(`Tool ${name} failed: ${describeError(error)}`);
      return errorResult('upstream', describeError(error));
    }
  }

  /**
   * LangChain structured tools for binding to a chat model. Invoking one
   * goes through {@link dispatch} and returns the result as JSON text.
   */
  toLangChainTools(): StructuredToolInterface[] {
    return TOOL_DEFINITIONS.map((definition) =>
      tool(
        async (input: unknown) =>
          JSON.stringify(await this.dispatch(definition.name, input)),
        {
          name: definition.name,
          description: definition.description,
          schema: definition.schema,
        },
      ),
    );
  }

  private async dispatchOperation<Op extends IdentityOperation>(
    operation: Op,
    args: unknown,
  ): Promise<ToolResult> {
    const parsed = TOOL_SCHEMAS[operation].safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      );
      const error = new ValidationError(
        `Invalid arguments for ${operation}: ${issues.join('; ')}`,
        issues,
      );
      this.logger.warn(error.message);
      return errorResult(error.kind, error.message);
    }

    this.logger.log(`Dispatching ${operation}`);
    return this.identityClient.invoke(operation, parsed.data);
  }
}
