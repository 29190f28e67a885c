import * as path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadContent } from './loader.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  /** Port to listen on (default: 3000) */
  port: number;
  /** Content directory to load .md files from */
  contentDir: string;
}

function parseArgs(args: string[]): ServerConfig {
  const portArg = args.find(a => a.startsWith('--port='));
  const dirArg = args.find(a => !a.startsWith('--'));
  return {
    port: portArg ? parseInt(portArg.split('=')[1], 10) : Number(process.env.PORT ?? 3000),
    contentDir: path.resolve(dirArg ?? process.cwd())
  };
}

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const { port, contentDir } = parseArgs(process.argv.slice(2));

  console.log(`Loading content from: ${contentDir}`);
  const config = await loadConfig(contentDir);
  const data = loadContent({ contentDir, config });

  console.log(`Indexed ${data.documents.size} documents`);
  if (config.showWarnings !== false && data.warnings.length > 0) {
    console.warn('Warnings:', data.warnings);
  }
  if (data.errors.length > 0) {
    console.warn('Errors:', data.errors);
  }

  const app = createApp(data);

  const server = app.listen(port, () => {
    console.log(`indexmark API listening on http://localhost:${port}`);
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
    }, 10000);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(error => {
  console.error('Failed to start server', error);
  process.exitCode = 1;
});
