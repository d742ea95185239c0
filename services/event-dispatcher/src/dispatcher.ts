import { PoolClient } from 'pg';
import { routingKeyFor } from '@stockroom/shared/src/messaging/client';
import { logger } from '@stockroom/shared/src/utils/logger';

export type TransactionRunner = <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

export type EventPublisher = (
     routingKey: string,
     payload: Record<string, unknown>,
     messageId: string
) => Promise<void>;

export interface DispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
}

interface PendingEventRow {
     id: string | number;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

/** Publishes committed outbox rows in creation order. */
export class EventDispatcher {
     private running = false;

     constructor(
          private readonly runInTransaction: TransactionRunner,
          private readonly publish: EventPublisher,
          private readonly options: DispatcherOptions
     ) {}

     async start(): Promise<void> {
          this.running = true;
          logger.info(this.options, 'Starting event dispatcher');

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     /** Returns the number of events taken from the outbox. */
     async processBatch(): Promise<number> {
          return this.runInTransaction(async (client) => {
               // SKIP LOCKED lets several dispatchers share the outbox
               const { rows: events } = await client.query<PendingEventRow>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.options.batchSize]
               );

               if (events.length === 0) {
                    return 0;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               for (const event of events) {
                    const eventId = String(event.id);
                    try {
                         await this.publish(routingKeyFor(event.type), event.payload, eventId);

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', updated_at = NOW()
            WHERE id = $1
          `,
                              [event.id]
                         );

                         logger.debug({ eventId, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         logger.error({ error, eventId }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, error instanceof Error ? error.message : 'Unknown error']
                         );
                    }
               }

               logger.info({ dispatched: events.length }, 'Event batch processed');
               return events.length;
          });
     }

     stop(): void {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
