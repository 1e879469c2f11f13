import { buildServer } from './adapters/http';
import { createAssistant } from './app';
import { logger } from './observability/logger';

async function start() {
  logger.info('=== tool-calling server start ===');
  const assistant = createAssistant();
  const server = buildServer(assistant);

  const { port, host } = assistant.config;
  await server.listen({ port, host });
  logger.info('server listening', { port, host, tools: assistant.registry.names() });
}

start().catch((err) => {
  logger.error('failed to start server', err);
  process.exit(1);
});
