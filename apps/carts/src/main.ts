import { CartService } from './carts/cart-service';
import { RedisCartRepository, RedisItemRepository } from './carts/repositories';
import { cartSchema, itemSchema } from './carts/types';
import { getConfig } from './config';
import { createLogger } from './lib/logger';
import { createRedisClient } from './lib/redis';
import { initSentry } from './observability/sentry';
import { ResourceMappings } from './resources/resource-mappings';
import { buildServer } from './server';

export async function bootstrap() {
  const config = getConfig();
  initSentry(config);

  const logger = createLogger(config);

  const redis = createRedisClient(config, logger);
  await redis.connect();

  const cartRepository = new RedisCartRepository(redis);
  const itemRepository = new RedisItemRepository(redis);
  const cartService = new CartService(cartRepository, itemRepository, logger);

  const resourceMappings = new ResourceMappings()
    .expose({ path: 'carts', repository: cartRepository, schema: cartSchema })
    .expose({ path: 'items', repository: itemRepository, schema: itemSchema });

  const app = await buildServer({
    config,
    redis,
    cartService,
    resourceMappings,
    logger,
  });

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { port: config.server.port, service: config.service.name },
    'Carts service listening',
  );

  return app;
}

if (require.main === module) {
  bootstrap()
    .then((app) => {
      const shutdown = async (signal: NodeJS.Signals) => {
        app.log.info({ signal }, 'Received shutdown signal');
        try {
          await app.close();
          process.exit(0);
        } catch (error) {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      };

      process.on('SIGTERM', shutdown);
      process.on('SIGINT', shutdown);
    })
    .catch((error) => {
      // eslint-disable-next-line no-console
      console.error('Failed to bootstrap carts service', error);
      process.exitCode = 1;
    });
}
