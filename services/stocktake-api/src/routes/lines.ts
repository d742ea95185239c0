import { FastifyInstance } from 'fastify';
import { withTransaction } from '@stockroom/shared/src/db/client';
import { StocktakeService } from '@stockroom/shared/src/services/stocktake-service';
import type { CountInput, OverrideKind } from '@stockroom/shared/src/types/stocktake.types';
import {
     lineOverrideSchema,
     recordCountSchema,
     recordOpeningSchema,
} from '../schemas/lines.schemas';
import { sendError } from './error-reply';

const stocktakeService = new StocktakeService();

interface LineParams {
     lineId: number;
}

export async function registerLineRoutes(app: FastifyInstance) {
     app.put<{ Params: LineParams; Body: CountInput }>(
          '/:lineId/count',
          { schema: recordCountSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.recordCount(client, request.params.lineId, request.body)
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to record count');
               }
          }
     );

     app.put<{ Params: LineParams; Body: CountInput }>(
          '/:lineId/opening',
          { schema: recordOpeningSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.recordOpeningCount(
                              client,
                              request.params.lineId,
                              request.body
                         )
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to record opening count');
               }
          }
     );

     app.put<{ Params: LineParams & { kind: OverrideKind }; Body: { amount: number | null } }>(
          '/:lineId/overrides/:kind',
          { schema: lineOverrideSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.setManualOverride(client, {
                              scope: 'line',
                              targetId: request.params.lineId,
                              kind: request.params.kind,
                              amount: request.body.amount,
                         })
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to set line override');
               }
          }
     );
}
