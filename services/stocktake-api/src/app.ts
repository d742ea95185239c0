import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { checkConnection } from '@stockroom/shared/src/db/client';
import { registerLineRoutes } from './routes/lines';
import { registerPeriodRoutes } from './routes/periods';
import { registerStocktakeRoutes } from './routes/stocktakes';

export interface BuildAppOptions {
     logger?: boolean;
     /** Skip the OpenAPI plugins (tests). */
     docs?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     if (options.docs ?? true) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Stockroom Stocktake API',
                         description:
                              'Stock counting, valuation and period reconciliation for hotel bars and stores',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:3000', description: 'Development' }],
                    tags: [
                         { name: 'periods', description: 'Stock periods and their summaries' },
                         { name: 'lifecycle', description: 'Close, reopen and audit history' },
                         { name: 'stocktakes', description: 'Stocktake lines and ledger refresh' },
                         { name: 'lines', description: 'Counting a single line' },
                         { name: 'overrides', description: 'Manual purchase, waste and sales values' },
                         { name: 'voice', description: 'Voice-driven counting' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: { database: { type: 'string' } },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_, reply) => {
               const dbHealthy = await checkConnection();
               if (!dbHealthy) {
                    reply.code(503);
                    return { status: 'not_ready', error: 'Database connection failed' };
               }
               return { status: 'ready', dependencies: { database: 'ok' } };
          }
     );

     await app.register(registerPeriodRoutes, { prefix: '/periods' });
     await app.register(registerStocktakeRoutes, { prefix: '/stocktakes' });
     await app.register(registerLineRoutes, { prefix: '/lines' });

     return app;
}
