import 'dotenv/config';
import { serve, type ServerType } from '@hono/node-server';
import { PodcastProcessor } from './PodcastProcessor';
import { createAPIServer } from './api/server';

async function main() {
  const configPath = process.env.CONFIG_PATH || './config';
  const configFile = process.env.CONFIG_FILE || 'config.yaml';
  console.log('🚀 Starting Podstrip');
  console.log(`📁 Config path: ${configPath}`);
  console.log(`📄 Config file: ${configFile}`);
  const processor = new PodcastProcessor(configPath, configFile);

  let server: ServerType | null = null;

  let shutdownInProgress = false;
  let forcedShutdownCount = 0;

  const shutdown = async (signal: string) => {
    if (shutdownInProgress) {
      forcedShutdownCount++;
      if (forcedShutdownCount >= 2) {
        console.log('\nForced shutdown!');
        process.exit(1);
      }
      console.log('\nShutdown in progress... Press Ctrl+C again to force quit');
      return;
    }

    shutdownInProgress = true;
    console.log(`\nReceived ${signal}, shutting down...`);

    // Hard limit; an in-flight episode can take far longer than this
    const shutdownTimeout = setTimeout(() => {
      console.log('\nShutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, 10000);

    try {
      if (server) {
        console.log('Stopping HTTP server...');
        server.close();
      }
      await processor.stop();
      clearTimeout(shutdownTimeout);
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      clearTimeout(shutdownTimeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGUSR2', () => void shutdown('SIGUSR2'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    void shutdown('unhandledRejection');
  });

  await processor.start();

  const app = createAPIServer(processor.getAPIDependencies());
  const { port, host } = processor.getConfig().getServerConfig();

  console.log(`Starting HTTP server on ${host}:${port}...`);
  server = serve({
    fetch: app.fetch,
    port,
    hostname: host
  });

  console.log(`Podstrip is running at ${processor.getConfig().getBaseUrl()}`);
  console.log(`Health check: http://localhost:${port}/health`);
  console.log('Press Ctrl+C to stop.');
}

export { PodcastProcessor } from './PodcastProcessor';
export { createAPIServer, type APIDependencies } from './api/server';
export { ProcessingScheduler } from './jobs/ProcessingScheduler';
export { ProcessingLease } from './jobs/ProcessingLease';
export { EpisodeService } from './services/EpisodeService';
export { FeedService } from './services/FeedService';

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
