// must run before the pool and channel modules load
import 'dotenv/config';
import { logger } from '@stockroom/shared/src/utils/logger';
import { buildApp } from './app';

const PORT = parseInt(process.env.STOCKTAKE_API_PORT || '3000', 10);
const HOST = process.env.STOCKTAKE_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp();

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Stocktake API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
