import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger } from '@gatehouse/shared';
import { initPool, closePool } from '@gatehouse/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const app = await buildServer({
    jwtActiveKid: config.JWT_ACTIVE_KID,
    jwtKeys: config.JWT_KEYS,
    jwtIssuer: config.JWT_ISSUER,
    jwtAccessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
    verifyRateLimitPerMinute: config.VERIFY_RATE_LIMIT_PER_MINUTE,
    faceMaxImageBytes: config.FACE_MAX_IMAGE_BYTES,
    accessLogMaxPageSize: config.ACCESS_LOG_MAX_PAGE_SIZE,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
