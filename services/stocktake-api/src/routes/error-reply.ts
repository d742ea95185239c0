import { FastifyReply } from 'fastify';
import {
     AmbiguousItemError,
     DomainError,
     IncompleteCountError,
} from '@stockroom/shared/src/utils/errors';
import { logger } from '@stockroom/shared/src/utils/logger';

function errorDetails(error: DomainError): Record<string, unknown> {
     if (error instanceof AmbiguousItemError) {
          return { contenders: error.contenders };
     }
     if (error instanceof IncompleteCountError) {
          return { uncountedSkus: error.uncountedSkus };
     }
     return {};
}

/** Domain errors keep their status and code; anything else is a logged 500. */
export function sendError(reply: FastifyReply, error: unknown, context: string): FastifyReply {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
               ...errorDetails(error),
          });
     }

     logger.error({ error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}
