import { loadConfig } from '@/lib/config';
import { createServices } from '@/lib/services';
import { createApp } from './app';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = app.listen(config.port, () => {
  console.log(`[Server] Listening on port ${config.port} with ${config.sourceList.length} sources`);
  console.log(`[Server] Resolver order: ${services.chain.order.join(' -> ') || 'none'}`);
});

const shutdown = (signal: string) => {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    services.db.close();
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
