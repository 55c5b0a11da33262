import express, { Application, NextFunction, Request, Response } from 'express';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadConfig } from './config.js';
import { loadContent } from './loader.js';
import { loadMetadataIndex } from './metadata.js';
import { ApiContext, createApiRoutes } from './routes/api.js';

/**
 * Create and configure the Express application
 */
export function createApp(context: ApiContext): Application {
  const { data } = context;
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(context));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      entities: data.entities.length,
      documented: data.corpus.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Errors thrown by a route, such as a bad metadata lookup
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error(err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const args = process.argv.slice(2);
  const config = await loadConfig();
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : config.port;

  console.log(`Loading content from: ${config.contentDir}`);
  const data = loadContent({ contentDir: config.contentDir });

  console.log(`Loaded ${data.entities.length} entities, ${data.corpus.size} docstrings`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const metadata = await loadMetadataIndex(config.metadataFile, {
    helpDir: config.helpDir,
    knownKeys: data.entities.map(entry => entry.descriptor.name)
  });

  const app = createApp({ data, metadata, flavour: config.dtd });

  const server = app.listen(port, () => {
    console.log(`doc2help preview listening on http://localhost:${port}`);
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

if (process.argv[1] && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href) {
  bootstrap().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
