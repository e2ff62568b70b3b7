import {
  Controller,
  Delete,
  Get,
  HttpStatus,
  Logger,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { describeError } from '../common/errors';
import { ToolRegistry } from '../tools/tool-registry';
import { createIdentityMcpServer } from './mcp-server.factory';

/**
 * Model Context Protocol endpoint for tool clients (not browsers).
 *
 * Endpoints:
 * - GET /mcp/status: describe the MCP surface
 * - POST /mcp: Streamable HTTP transport, stateless with JSON responses
 * - GET, DELETE /mcp: 405, no sessions are kept
 */
@Controller('mcp')
export class McpController {
  private readonly logger = new Logger(McpController.name);

  constructor(private readonly toolRegistry: ToolRegistry) {}

  @Get('status')
  getStatus(): {
    mcpServer: 'active';
    endpoint: string;
    transport: 'streamable-http';
    tools: string[];
    note: string;
  } {
    return {
      mcpServer: 'active',
      endpoint: '/mcp',
      transport: 'streamable-http',
      tools: this.toolRegistry.names(),
      note: 'POST JSON-RPC requests to /mcp with an MCP client. Not for browser access.',
    };
  }

  /**
   * One server and transport per request; nothing survives the response.
   */
  @Post()
  async handle(@Req() req: Request, @Res() res: Response): Promise<void> {
    const server = createIdentityMcpServer(this.toolRegistry);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch(
        (error: unknown) => {
          this.logger.warn(`MCP cleanup failed: ${describeError(error)}`);
        },
      );
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      this.logger.error(`MCP request failed: ${describeError(error)}`);
      if (!res.headersSent) {
        res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  }

  @Get()
  rejectGet(@Res() res: Response): void {
    this.methodNotAllowed(res);
  }

  @Delete()
  rejectDelete(@Res() res: Response): void {
    this.methodNotAllowed(res);
  }

  private methodNotAllowed(res: Response): void {
    res.status(HttpStatus.METHOD_NOT_ALLOWED).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  }
}
