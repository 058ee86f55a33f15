/**
 * Metadata HTTP Server
 *
 * Express app on the metadata port: `/health`, plus the protected resource
 * metadata document with CORS headers for browser-based clients. The tool
 * port serves the same document through FastMCP.
 */

import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import { createServer, type Server } from 'http';
import type { MetadataConfig } from '../config/schemas.js';
import {
  PROTECTED_RESOURCE_PATH,
  generateProtectedResourceMetadata,
} from './oauth-metadata.js';

export interface MetadataServerOptions {
  metadata: MetadataConfig;

  /** Tool endpoint path; the document is also served under it (RFC 9728 §3.1) */
  mcpPath: string;

  /** Service name reported by /health */
  serviceName: string;
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    if ('statusCode' in err && typeof err.statusCode === 'number') {
      return err.statusCode;
    }
    if ('status' in err && typeof err.status === 'number') {
      return err.status;
    }
  }
  return 500;
}

/**
 * Create the Express app serving:
 * - GET /.well-known/oauth-protected-resource
 * - GET /.well-known/oauth-protected-resource<mcpPath>
 * - GET /health
 */
export function createMetadataServer(options: MetadataServerOptions): express.Application {
  const app = express();
  const document = generateProtectedResourceMetadata(options.metadata);

  // CORS headers (required for browser-based MCP clients)
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id');
    res.header('Access-Control-Expose-Headers', 'WWW-Authenticate, Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  const sendMetadata = (_req: Request, res: Response) => {
    res.json(document);
  };
  app.get(PROTECTED_RESOURCE_PATH, sendMetadata);
  if (options.mcpPath !== '/') {
    app.get(`${PROTECTED_RESOURCE_PATH}${options.mcpPath}`, sendMetadata);
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: options.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', error_description: 'Not found' });
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = statusOf(err);

    console.error('[HTTP Server] Error:', err);
    res.status(status).json({
      error: 'server_error',
      error_description: status >= 500 ? 'Internal server error' : 'Request failed',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Listen on `port` (and `host`, when given)
 */
export function startHTTPServer(
  app: express.Application,
  port: number,
  host?: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    const onListening = () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      console.log(
        `[HTTP Server] Resource metadata: http://localhost:${port}${PROTECTED_RESOURCE_PATH}`
      );
      resolve(server);
    };

    if (host) {
      server.listen(port, host, onListening);
    } else {
      server.listen(port, onListening);
    }
  });
}

export function stopHTTPServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
