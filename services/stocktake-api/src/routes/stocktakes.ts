import { FastifyInstance } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { StocktakeService } from '@stockroom/shared/src/services/stocktake-service';
import {
     VoiceCommandAdapter,
     voiceMatchOptionsFromEnv,
} from '@stockroom/shared/src/services/voice-command-adapter';
import type { MatchCandidate } from '@stockroom/shared/src/types/stocktake.types';
import {
     listLinesSchema,
     refreshMovementsSchema,
     voiceCommandSchema,
} from '../schemas/stocktakes.schemas';
import { sendError } from './error-reply';

const stocktakeService = new StocktakeService();
const voiceAdapter = new VoiceCommandAdapter(stocktakeService, voiceMatchOptionsFromEnv());

interface StocktakeParams {
     stocktakeId: number;
}

interface VoiceCommandBody {
     command: {
          action: string;
          itemIdentifier: string;
          fullUnits?: number | null;
          partialUnits?: number | null;
     };
     candidates: MatchCandidate[];
}

export async function registerStocktakeRoutes(app: FastifyInstance) {
     app.get<{ Params: StocktakeParams }>(
          '/:stocktakeId/lines',
          { schema: listLinesSchema },
          async (request, reply) => {
               const { stocktakeId } = request.params;
               try {
                    const lines = await withConnection((client) =>
                         stocktakeService.getLines(client, stocktakeId)
                    );
                    return reply.send({
                         stocktakeId,
                         lines: lines.map((line) => stocktakeService.describeLine(line)),
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to list stocktake lines');
               }
          }
     );

     app.post<{ Params: StocktakeParams }>(
          '/:stocktakeId/movements/refresh',
          { schema: refreshMovementsSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((client) =>
                         stocktakeService.refreshMovements(client, request.params.stocktakeId)
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to refresh movements');
               }
          }
     );

     app.post<{ Params: StocktakeParams; Body: VoiceCommandBody }>(
          '/:stocktakeId/voice-commands',
          { schema: voiceCommandSchema },
          async (request, reply) => {
               const { command, candidates } = request.body;
               try {
                    const result = await withTransaction((client) =>
                         voiceAdapter.applyCommand(
                              client,
                              request.params.stocktakeId,
                              {
                                   action: command.action,
                                   itemIdentifier: command.itemIdentifier,
                                   fullUnits: command.fullUnits ?? null,
                                   partialUnits: command.partialUnits ?? null,
                              },
                              candidates
                         )
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to apply voice command');
               }
          }
     );
}
