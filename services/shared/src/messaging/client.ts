import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const STOCKTAKE_EVENTS_EXCHANGE = 'stocktake.events';
export const STOCKTAKE_DLX = 'dlx.stocktake';
export const DASHBOARD_QUEUE = 'stocktake.dashboard';
export const DASHBOARD_DLQ = 'dlq.stocktake.dashboard';

export function routingKeyFor(eventType: string): string {
     return `stocktake.${eventType}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, attempting to reconnect...');
          setTimeout(() => {
               connection = null;
               channel = null;
          }, 5000);
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     const conn = connection ?? (await connect());
     connection = conn;

     const ch = await conn.createChannel();

     await ch.assertExchange(STOCKTAKE_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(STOCKTAKE_DLX, 'topic', { durable: true });

     // Reporting dashboards consume every stocktake event
     await ch.assertQueue(DASHBOARD_QUEUE, {
          durable: true,
          deadLetterExchange: STOCKTAKE_DLX,
          deadLetterRoutingKey: DASHBOARD_DLQ,
     });
     await ch.assertQueue(DASHBOARD_DLQ, { durable: true });

     await ch.bindQueue(DASHBOARD_QUEUE, STOCKTAKE_EVENTS_EXCHANGE, 'stocktake.#');
     await ch.bindQueue(DASHBOARD_DLQ, STOCKTAKE_DLX, DASHBOARD_DLQ);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>,
     messageId?: string
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          messageId,
     });
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
