import express, { type Application } from 'express';
import morgan from 'morgan';
import { loadSources, type LoadResult } from './loader.js';
import { loadConfig } from './config.js';
import { createApiRoutes } from './routes/api.js';

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult): Application {
  const app = express();

  // Middleware
  app.use(morgan('dev'));

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.sources.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/**
 * Start the preview server
 */
async function bootstrap() {
  const config = await loadConfig();

  console.log(`Loading content from: ${config.contentDir}`);
  const data = loadSources(config.contentDir);

  console.log(`Loaded ${data.sources.size} documents`);

  for (const missing of data.missing) {
    console.warn(`Warning: ${missing.message}`);
  }

  const app = createApp(data);

  const server = app.listen(config.port, () => {
    console.log(`Review preview listening on http://localhost:${config.port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exitCode = 1;
});
