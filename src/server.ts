import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Orchestrator } from './orchestrator/orchestrator.js';
import { registerTools } from './tools/index.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'microvm-orchestrator';
export const SERVER_VERSION = '0.3.0';
export const MCP_PATH = '/mcp';

interface McpHttpServerOptions {
  host?: string;
  port?: number;
}

/**
 * Serves the orchestrator's tools over MCP streamable HTTP.
 *
 * Stateless: every POST gets a fresh McpServer and transport, so a client
 * keeps working across server restarts. Orchestrator state lives outside.
 */
export class McpHttpServer {
  private app: express.Application;
  private server: Server | null = null;
  private readonly host: string;
  private port: number;

  constructor(
    private readonly orchestrator: Orchestrator,
    options: McpHttpServerOptions = {}
  ) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8765;
    this.app = express();
    this.app.use(express.json({ limit: '4mb' }));
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.post(MCP_PATH, async (req: Request, res: Response) => {
      const connection = new AbortController();
      const server = this.createMcpServer(connection.signal);
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

      res.on('close', () => {
        if (!res.writableFinished) {
          connection.abort(new Error('Client disconnected'));
        }
        transport.close().catch((err: unknown) => logger.warn('Failed to close MCP transport', err));
        server.close().catch((err: unknown) => logger.warn('Failed to close MCP server', err));
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        logger.error('Error handling MCP request', err);
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: '2.0',
            error: { code: -32603, message: 'Internal server error' },
            id: null,
          });
        }
      }
    });

    // Stateless: no server-initiated streams, no sessions to delete
    const methodNotAllowed = (_req: Request, res: Response): void => {
      res.status(405).json({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
    };
    this.app.get(MCP_PATH, methodNotAllowed);
    this.app.delete(MCP_PATH, methodNotAllowed);

    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        runningTasks: this.orchestrator.runningCount,
      });
    });
  }

  private createMcpServer(connectionSignal: AbortSignal): McpServer {
    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
    registerTools(server, this.orchestrator, connectionSignal);
    return server;
  }

  /**
   * Start the server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        logger.info(`MCP server listening on http://${this.host}:${this.port}${MCP_PATH}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop the server.
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          logger.warn('Error stopping MCP server', err);
        }
        this.server = null;
        logger.info('MCP server stopped');
        resolve();
      });
      this.server.closeAllConnections();
    });
  }

  getPort(): number {
    return this.port;
  }
}
