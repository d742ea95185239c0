// must run before the pool and channel modules load
import 'dotenv/config';
import { withTransaction } from '@stockroom/shared/src/db/client';
import {
     closeConnection,
     publishEvent,
     STOCKTAKE_EVENTS_EXCHANGE,
} from '@stockroom/shared/src/messaging/client';
import { logger } from '@stockroom/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

const BATCH_SIZE = parseInt(process.env.EVENT_BATCH_SIZE || '100', 10);
const POLL_INTERVAL_MS = parseInt(process.env.EVENT_POLL_INTERVAL_MS || '200', 10);

async function main() {
     const dispatcher = new EventDispatcher(
          withTransaction,
          (routingKey, payload, messageId) =>
               publishEvent(STOCKTAKE_EVENTS_EXCHANGE, routingKey, payload, messageId),
          { batchSize: BATCH_SIZE, pollIntervalMs: POLL_INTERVAL_MS }
     );

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, 1000));
          await closeConnection();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
