/**
 * MCP Server Base Classes
 *
 * Tool registration and JSON-RPC dispatch shared by the MCP servers.
 * Transport-agnostic: `serve()` drives any `FrameTransport`, one frame in,
 * one response out, strictly in order.
 *
 * Usage:
 *   import { MCPServer, MCPTool, textResult } from '../../_shared/ts/mcp-base';
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { errorMessage } from './errors';
import {
  errorResponse,
  parseEnvelope,
  successResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './json-rpc';
import type { Logger } from './logger';
import type { PathSandbox } from './sandbox';
import type { FrameTransport } from './transport';
import { describeArgumentIssues, formatZodIssues } from './validation';

// ─── Types ──────────────────────────────────────────────────────────────────

export const PROTOCOL_VERSION = '2024-11-05';

export interface TextContent {
  type: 'text';
  text: string;
}

/** Result returned by a tool execution */
export interface ToolResult {
  content: TextContent[];
  isError?: boolean;
}

/** Structured error for protocol-level failures inside the dispatcher */
export class MCPError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
    this.name = 'MCPError';
  }
}

/** JSON-RPC error codes used on the wire */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  SERVER_ERROR: -32000,
} as const;

/** Collaborators handed to every tool execution */
export interface ToolContext {
  sandbox: PathSandbox;
  logger: Logger;
}

/** Tool definition interface — every tool implements this */
export interface MCPTool<TParams = unknown> {
  /** Tool name as exposed to clients */
  name: string;

  /** Human-readable description for the model */
  description: string;

  /** Zod schema for argument validation; also the source of `inputSchema` */
  paramsSchema: ZodType<TParams, ZodTypeDef, unknown>;

  /** Execute the tool with validated params. Expected failures come back as `isError` results. */
  execute(params: TParams, context: ToolContext): Promise<ToolResult>;
}

export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

// ─── Result Helpers ─────────────────────────────────────────────────────────

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/** `<op> <path>: <cause>` as an error result */
export function failureResult(op: string, requestedPath: string, cause: unknown): ToolResult {
  return errorResult(`${op} ${requestedPath}: ${errorMessage(cause)}`);
}

/** Concatenated text of a result's content blocks */
export function resultText(result: ToolResult): string {
  return result.content.map((block) => block.text).join('');
}

// ─── Params Schemas ─────────────────────────────────────────────────────────

const initializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    clientInfo: z.object({ name: z.string().optional(), version: z.string().optional() }).optional(),
  })
  .optional();

const callToolParamsSchema = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

// ─── MCPServer ──────────────────────────────────────────────────────────────

export interface MCPServerConfig {
  name: string;
  version: string;
  tools: MCPTool[];
  context: ToolContext;
}

/**
 * Base MCP Server class.
 *
 * Registers tools, validates params and dispatches `initialize`,
 * `mcp.list_tools` and `mcp.call_tool`. Every frame yields exactly one
 * response; per-request failures never end the connection.
 *
 * Usage:
 *   const server = new MCPServer({ name: 'fs-sandbox', version: '1.0.0', tools: [...], context });
 *   await server.serve(new StdioTransport());
 */
export class MCPServer {
  readonly name: string;
  readonly version: string;
  private readonly tools: Map<string, MCPTool>;
  private readonly descriptors: readonly ToolDescriptor[];
  private readonly context: ToolContext;
  private readonly logger: Logger;

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.context = config.context;
    this.logger = config.context.logger;
    this.tools = new Map();

    for (const tool of config.tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }

    this.descriptors = this.buildToolDefinitions();
  }

  /**
   * Build the tool descriptors once. Each zod schema is converted to JSON
   * Schema so clients see property, required and description metadata.
   */
  private buildToolDefinitions(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.paramsSchema, {
        target: 'openApi3',
        $refStrategy: 'none',
      }),
    }));
  }

  /** Descriptors in registration order */
  listTools(): readonly ToolDescriptor[] {
    return this.descriptors;
  }

  /** Run one frame-in/frame-out loop until the transport ends. */
  async serve(transport: FrameTransport): Promise<void> {
    for await (const frame of transport.frames()) {
      if (frame.trim().length === 0) continue;
      const response = await this.handleMessage(frame);
      await transport.send(JSON.stringify(response));
    }
  }

  /** Handle one raw frame. Always resolves to exactly one response. */
  async handleMessage(raw: string): Promise<JsonRpcResponse> {
    const envelope = parseEnvelope(raw);
    if (!envelope.ok) {
      this.logger.warn(envelope.message);
      return errorResponse(envelope.id, ErrorCodes.PARSE_ERROR, envelope.message);
    }

    const request = envelope.request;
    this.logger.debug(`<- ${request.method} (id ${JSON.stringify(request.id)})`);

    try {
      return await this.handleRequest(request);
    } catch (err) {
      if (err instanceof MCPError) {
        return errorResponse(request.id, err.code, err.message);
      }
      this.logger.error(`unexpected failure handling ${request.method}: ${errorMessage(err)}`);
      return errorResponse(request.id, ErrorCodes.SERVER_ERROR, `Internal error: ${errorMessage(err)}`);
    }
  }

  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    switch (request.method) {
      case 'initialize':
        return this.handleInitialize(request);
      case 'mcp.list_tools':
        return successResponse(request.id, { tools: this.descriptors });
      case 'mcp.call_tool':
        return this.handleToolCall(request);
      default:
        throw new MCPError(ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }

  private handleInitialize(request: JsonRpcRequest): JsonRpcResponse {
    const parsed = initializeParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw new MCPError(ErrorCodes.INVALID_PARAMS, `Invalid params: ${formatZodIssues(parsed.error)}`);
    }

    const client = parsed.data?.clientInfo;
    this.logger.info(
      `initialize from ${client?.name ?? 'unknown client'} ${client?.version ?? ''}`.trimEnd() +
        ` (protocol ${parsed.data?.protocolVersion ?? 'unspecified'})`,
    );

    return successResponse(request.id, {
      serverInfo: { name: this.name, version: this.version },
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
    });
  }

  private async handleToolCall(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const parsed = callToolParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw new MCPError(ErrorCodes.INVALID_PARAMS, `Invalid params: ${formatZodIssues(parsed.error)}`);
    }

    const result = await this.callTool(parsed.data.name, parsed.data.arguments);
    return successResponse(request.id, result);
  }

  /**
   * Look up, validate and run a tool. Unknown names, bad arguments and
   * handler throws all come back as `isError` results.
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn(`call to unknown tool ${name}`);
      return errorResult(`unknown tool: ${name}`);
    }

    const parsed = tool.paramsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return errorResult(`${name}: ${describeArgumentIssues(parsed.error)}`);
    }

    this.logger.debug(`calling ${name}`);
    try {
      const result = await tool.execute(parsed.data, this.context);
      if (result.isError) {
        this.logger.debug(`${name} failed: ${resultText(result)}`);
      }
      return result;
    } catch (err) {
      this.logger.error(`${name} threw: ${errorMessage(err)}`);
      return errorResult(`${name}: ${errorMessage(err)}`);
    }
  }
}
