import { env } from './env';
import { log } from './log';
import { closeRedisClient } from './redis/client';
import { buildServer } from './server';

const { server, sessionManager } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});

function shutdown(signal: string): void {
  log.info({ signal, active_calls: sessionManager.getActiveCount() }, 'shutting down');
  server.close((error) => {
    if (error) {
      log.error({ err: error }, 'http server close failed');
    }
    closeRedisClient()
      .catch((closeError: unknown) => {
        log.error({ err: closeError }, 'redis close failed');
      })
      .finally(() => process.exit(0));
  });
}

process.once('SIGTERM', () => shutdown('SIGTERM'));
process.once('SIGINT', () => shutdown('SIGINT'));
