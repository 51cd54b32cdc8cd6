/**
 * @fileoverview MCP Server for build triage
 *
 * Exposes the two-phase retrieval protocol to MCP clients:
 * - `analyze_build`: classify a build and return the compact manifest
 * - `get_finding_details`: drill down from a manifest entry to its full record
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import {
  analyzeBuild,
  describeLookupMiss,
  getFindingDetails,
  type FindingSource,
} from '../api/analyze_build.js';
import { loadTriageConfig } from '../config/index.js';
import { getErrorMessage, isTriageError } from '../core/errors.js';
import { BundleFindingSource } from '../sources/bundle_source.js';
import { InMemoryFindingsStore, type FindingsStore } from '../storage/findings_store.js';
import { logDebug, logError, logInfo, setLogLevel } from '../telemetry/logger.js';
import { serializeFinding, serializeManifest } from '../triage/wire.js';
import {
  JSON_SCHEMAS,
  listToolSchemas,
  validateToolInput,
  type AnalyzeBuildToolInput,
  type GetFindingDetailsToolInput,
  type ToolName,
} from './schema.js';
import {
  DEFAULT_MCP_SERVER_CONFIG,
  type ServerInfo,
  type TriageMCPServerConfig,
  type TriageMCPServerOptions,
} from './types.js';

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  analyze_build:
    'Analyze a CI build. Returns tier-1 findings (unique failures, likely root causes) in full and ' +
    'short summaries of lower tiers. Use get_finding_details to expand a summary.',
  get_finding_details:
    'Full record (untruncated message, pre/post context, tier data) for one finding of a previous analyze_build call.',
};

/** Tool call that failed for an expected reason; rendered without a stack. */
class ToolFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolFailure';
  }
}

// ============================================================================
// SERVER IMPLEMENTATION
// ============================================================================

export class TriageMCPServer {
  private server: Server;
  private config: TriageMCPServerConfig;
  private source: FindingSource;
  private store: FindingsStore;
  private transport: StdioServerTransport | null = null;

  constructor(options: TriageMCPServerOptions) {
    this.config = { ...DEFAULT_MCP_SERVER_CONFIG, ...options.config };
    this.source = options.source;
    this.store = options.store ?? new InMemoryFindingsStore();

    this.server = new Server(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      return { tools: this.getAvailableTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  getAvailableTools(): Tool[] {
    return listToolSchemas().map((name) => {
      const schema = JSON_SCHEMAS[name];
      return {
        name,
        description: TOOL_DESCRIPTIONS[name],
        inputSchema: {
          type: 'object',
          properties: schema.properties,
          required: schema.required,
        },
      };
    });
  }

  /**
   * Validate and run a tool. Failures come back as `isError` results, never
   * as rejections, so the transport always has something to send.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const startTime = Date.now();

    try {
      const validation = validateToolInput(name, args ?? {});
      if (!validation.valid) {
        throw new ToolFailure(`Invalid input: ${validation.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ')}`);
      }

      const result = validation.tool === 'analyze_build'
        ? await this.executeAnalyzeBuild(validation.data)
        : this.executeGetFindingDetails(validation.data);

      logDebug('[mcp] tool call succeeded', { tool: name, durationMs: Date.now() - startTime });

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      const message = isTriageError(error) ? error.toUserMessage() : getErrorMessage(error);
      logError('[mcp] tool call failed', {
        tool: name,
        durationMs: Date.now() - startTime,
        error: getErrorMessage(error),
      });

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({ error: true, message }),
          },
        ],
        isError: true,
      };
    }
  }

  private async executeAnalyzeBuild(input: AnalyzeBuildToolInput): Promise<unknown> {
    const manifest = await analyzeBuild(
      { source: this.source, store: this.store },
      { buildUrl: input.url, limit: input.limit ?? this.config.defaultLimit }
    );
    return serializeManifest(manifest);
  }

  private executeGetFindingDetails(input: GetFindingDetailsToolInput): unknown {
    const lookup = getFindingDetails(this.store, input.request_id, input.finding_id);
    if (!lookup.ok) {
      throw new ToolFailure(describeLookupMiss(lookup.error));
    }
    return serializeFinding(lookup.value);
  }

  getServerInfo(): ServerInfo {
    return {
      name: this.config.name,
      version: this.config.version,
      defaultLimit: this.config.defaultLimit,
    };
  }

  // ============================================================================
  // SERVER LIFECYCLE
  // ============================================================================

  /**
   * Start the server with stdio transport.
   */
  async start(): Promise<void> {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    logInfo(`[mcp] ci-triage server started (${this.config.name} v${this.config.version})`);
  }

  async stop(): Promise<void> {
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createTriageMCPServer(options: TriageMCPServerOptions): TriageMCPServer {
  return new TriageMCPServer(options);
}

/**
 * Create and start a server with stdio transport.
 */
export async function startStdioServer(options: TriageMCPServerOptions): Promise<TriageMCPServer> {
  const server = createTriageMCPServer(options);
  await server.start();
  return server;
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

/**
 * Serve bundles from the configured findings directory over stdio.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<TriageMCPServer> {
  const config = loadTriageConfig(env);
  setLogLevel(config.logLevel);

  const server = await startStdioServer({
    source: new BundleFindingSource(config.findingsDir),
    config: { defaultLimit: config.defaultLimit },
  });

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logError('[mcp] shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}
