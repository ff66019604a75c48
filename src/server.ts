import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { config } from './config.js';
import { ApiServices, createRoutes } from './api/routes.js';
import { getErrorMessage } from './utils/errors.js';

/**
 * Create and configure the Express server
 */
export function createServer(services: ApiServices): express.Application {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api', createRoutes(services));

  // API 404 handler - catch any unmatched /api routes and return JSON
  app.use('/api/*', (req: Request, res: Response) => {
    console.error(`[API] 404 - Route not found: ${req.method} ${req.originalUrl}`);
    res.status(404).json({
      success: false,
      error: `Route not found: ${req.method} ${req.originalUrl}`
    });
  });

  // API error handler - malformed JSON bodies and anything a route let through
  app.use('/api', (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
    console.error(`[API] Error (${status}): ${getErrorMessage(err)}`);
    res.status(status).json({
      success: false,
      error: getErrorMessage(err) || 'Internal server error'
    });
  });

  return app;
}

/**
 * Start the server
 */
export function startServer(app: express.Application, port: number = config.port): Promise<Server> {
  return new Promise((resolve, reject) => {
    const host = process.env.HOST || '0.0.0.0';
    const server = app.listen(port, host, () => {
      console.log(`\n🚀 Server running on http://${host}:${port}\n`);
      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        console.error(`\n❌ Port ${port} is already in use!\n`);
        console.error('Use a different port by setting PORT in your .env file');
      }
      reject(error);
    });
  });
}
