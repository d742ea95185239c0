import { FastifyInstance } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { PeriodLifecycleService } from '@stockroom/shared/src/services/period-lifecycle-service';
import { PeriodSummaryService } from '@stockroom/shared/src/services/period-summary-service';
import { StocktakeService } from '@stockroom/shared/src/services/stocktake-service';
import type { OverrideKind } from '@stockroom/shared/src/types/stocktake.types';
import {
     closePeriodSchema,
     createPeriodSchema,
     periodHistorySchema,
     periodOverrideSchema,
     periodSummaryRouteSchema,
     populateStocktakeSchema,
     reopenPeriodSchema,
} from '../schemas/periods.schemas';
import { sendError } from './error-reply';

const stocktakeService = new StocktakeService();
const summaryService = new PeriodSummaryService();
const lifecycleService = new PeriodLifecycleService(summaryService);

interface PeriodParams {
     periodId: number;
}

interface ActorBody {
     actor: string;
}

export async function registerPeriodRoutes(app: FastifyInstance) {
     app.post<{
          Body: { hotelId: number; name: string; startDate: string; endDate: string };
     }>('/', { schema: createPeriodSchema }, async (request, reply) => {
          try {
               const period = await withTransaction((client) =>
                    stocktakeService.createPeriod(client, request.body)
               );
               return reply.code(201).send(period);
          } catch (error) {
               return sendError(reply, error, 'Failed to create period');
          }
     });

     app.post<{ Params: PeriodParams }>(
          '/:periodId/stocktake',
          { schema: populateStocktakeSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.populateStocktake(client, request.params.periodId)
                    );
                    return reply.code(201).send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to populate stocktake');
               }
          }
     );

     app.get<{ Params: PeriodParams }>(
          '/:periodId/summary',
          { schema: periodSummaryRouteSchema },
          async (request, reply) => {
               try {
                    const summary = await withConnection((client) =>
                         summaryService.getPeriodSummary(client, request.params.periodId)
                    );
                    return reply.send(summary);
               } catch (error) {
                    return sendError(reply, error, 'Failed to compute period summary');
               }
          }
     );

     app.put<{ Params: PeriodParams & { kind: OverrideKind }; Body: { amount: number | null } }>(
          '/:periodId/overrides/:kind',
          { schema: periodOverrideSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.setManualOverride(client, {
                              scope: 'period',
                              targetId: request.params.periodId,
                              kind: request.params.kind,
                              amount: request.body.amount,
                         })
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to set period override');
               }
          }
     );

     app.post<{ Params: PeriodParams; Body: ActorBody }>(
          '/:periodId/close',
          { schema: closePeriodSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         lifecycleService.closePeriod(
                              client,
                              request.params.periodId,
                              request.body.actor
                         )
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to close period');
               }
          }
     );

     app.post<{ Params: PeriodParams; Body: ActorBody }>(
          '/:periodId/reopen',
          { schema: reopenPeriodSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         lifecycleService.reopenPeriod(
                              client,
                              request.params.periodId,
                              request.body.actor
                         )
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to reopen period');
               }
          }
     );

     app.get<{ Params: PeriodParams }>(
          '/:periodId/history',
          { schema: periodHistorySchema },
          async (request, reply) => {
               try {
                    const entries = await withConnection((client) =>
                         lifecycleService.getPeriodHistory(client, request.params.periodId)
                    );
                    return reply.send({ periodId: request.params.periodId, entries });
               } catch (error) {
                    return sendError(reply, error, 'Failed to load period history');
               }
          }
     );
}
