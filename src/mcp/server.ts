/**
 * Delegated Tool Server
 *
 * FastMCP server whose tools only run behind the Delegation Gate. FastMCP
 * publishes the protected resource metadata document on the tool port; the
 * Express listener on the metadata port adds `/health` and a CORS-enabled
 * copy of the document.
 *
 * @example
 * ```typescript
 * const config = new ConfigManager().fromEnvironment();
 * const context = await new GateOrchestrator({ config }).buildContext();
 * const server = new DelegatedToolServer(context);
 * await server.start();
 * ```
 */

import { FastMCP, UserError } from 'fastmcp';
import type { Server } from 'http';
import { GateOrchestrator, type GateContext } from './orchestrator.js';
import {
  AuthorizationDeniedError,
  DENIAL_MESSAGES,
  requireReady,
  type DelegationGate,
} from './delegation-gate.js';
import { createBearerAuthenticator } from './middleware.js';
import { createMetadataServer, startHTTPServer, stopHTTPServer } from './http-server.js';
import { resourceMetadataUrl, toProtectedResourceOption } from './oauth-metadata.js';
import { DownstreamRequestError } from './tools/graph-client.js';
import { getAllToolFactories } from './tools/index.js';
import type { ToolContext, ToolRegistration, ToolSession } from './types.js';

type SemVer = `${number}.${number}.${number}`;
type EndpointPath = `/${string}`;

function isSemVer(version: string): version is SemVer {
  return /^\d+\.\d+\.\d+$/.test(version);
}

function isEndpointPath(path: string): path is EndpointPath {
  return path.startsWith('/');
}

/**
 * Wrap a tool so its body only runs with a Ready gate result
 *
 * Denials surface to the client as a `UserError` carrying the fixed denial
 * message; downstream failures surface without response bodies.
 */
export function createToolExecutor(
  gate: DelegationGate,
  tool: ToolRegistration
): (session: ToolSession | undefined) => Promise<string> {
  return async (session) => {
    if (!session?.accessToken) {
      throw new UserError(DENIAL_MESSAGES.malformed);
    }

    let context: ToolContext;
    try {
      const { credential, claims } = requireReady(await gate.authorize(session.accessToken));
      context = { credential, claims };
    } catch (error) {
      if (error instanceof AuthorizationDeniedError) {
        throw new UserError(error.message);
      }
      throw error;
    }

    try {
      return await tool.handler(context);
    } catch (error) {
      if (error instanceof DownstreamRequestError) {
        console.error(`[${tool.name}] ${error.message}`, { path: error.path, status: error.status });
        throw new UserError(error.message);
      }
      throw error;
    }
  };
}

export class DelegatedToolServer {
  private mcpServer: FastMCP<ToolSession> | null = null;
  private metadataServer: Server | null = null;
  private readonly tools: ToolRegistration[];

  constructor(
    private readonly context: GateContext,
    tools?: ToolRegistration[]
  ) {
    this.tools = tools ?? getAllToolFactories().map((factory) => factory({ graph: context.graph }));
  }

  /**
   * Build the FastMCP instance with every tool registered behind the gate
   */
  createMCPServer(): FastMCP<ToolSession> {
    const { config, gate } = this.context;
    const version: SemVer = isSemVer(config.server.version) ? config.server.version : '1.0.0';

    const server = new FastMCP<ToolSession>({
      name: config.server.name,
      version,
      authenticate: createBearerAuthenticator({
        realm: config.server.name,
        resourceMetadata: resourceMetadataUrl(config.metadata.resource),
      }),
      // The challenge above points here, so the document lives on the tool port
      oauth: {
        enabled: true,
        protectedResource: toProtectedResourceOption(config.metadata),
      },
    });

    for (const tool of this.tools) {
      console.log(`[DelegatedToolServer] Registering tool: ${tool.name}`);
      const execute = createToolExecutor(gate, tool);
      server.addTool({
        name: tool.name,
        description: tool.description,
        parameters: tool.schema,
        execute: async (_args, toolContext) => execute(toolContext.session),
      });
    }

    return server;
  }

  getTools(): ToolRegistration[] {
    return [...this.tools];
  }

  async start(): Promise<void> {
    if (this.mcpServer) {
      throw new Error('Server is already running. Call stop() first.');
    }

    const { config } = this.context;
    const endpoint: EndpointPath = isEndpointPath(config.server.mcpPath)
      ? config.server.mcpPath
      : '/mcp';

    this.metadataServer = await startHTTPServer(
      createMetadataServer({
        metadata: config.metadata,
        mcpPath: endpoint,
        serviceName: config.server.name,
      }),
      config.server.metadataPort,
      config.server.host
    );

    this.mcpServer = this.createMCPServer();
    await this.mcpServer.start({
      transportType: 'httpStream',
      httpStream: {
        host: config.server.host,
        port: config.server.port,
        endpoint,
        stateless: true,
      },
    });

    console.log('\n' + '='.repeat(60));
    console.log('[DelegatedToolServer] ✓ Server started successfully');
    console.log('='.repeat(60));
    console.log(`  Server Name:       ${config.server.name}`);
    console.log(`  Endpoint:          http://${config.server.host}:${config.server.port}${endpoint}`);
    console.log(`  Resource Metadata: ${resourceMetadataUrl(config.metadata.resource)}`);
    console.log(`  Health:            http://${config.server.host}:${config.server.metadataPort}/health`);
    console.log(`  Validation:        ${this.context.policy.kind}`);
    console.log(`  Delegation:        ${this.context.gate.mode}`);
    console.log(`  Tools Registered:  ${this.tools.map((tool) => tool.name).join(', ')}`);
    console.log(`  Audit Logging:     ${this.context.audit.isEnabled() ? 'Enabled' : 'Disabled'}`);
    console.log('='.repeat(60) + '\n');
  }

  async stop(): Promise<void> {
    console.log('[DelegatedToolServer] Stopping server...');

    if (this.mcpServer) {
      await this.mcpServer.stop();
      this.mcpServer = null;
    }
    if (this.metadataServer) {
      await stopHTTPServer(this.metadataServer);
      this.metadataServer = null;
    }
    await GateOrchestrator.destroyContext(this.context);

    console.log('[DelegatedToolServer] ✓ Server stopped');
  }
}
