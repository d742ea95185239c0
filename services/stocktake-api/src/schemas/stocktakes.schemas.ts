import {
     countBodyProperties,
     errorResponse,
     idParams,
     internalErrorResponse,
     lineWriteResponse,
     stocktakeLineSchema,
} from './common.schemas';

const stocktakeParams = idParams('stocktakeId', 'Stocktake id');

const stocktakeNotFound = errorResponse(
     'Stocktake not found',
     'STOCKTAKE_NOT_FOUND',
     'Stocktake 7 not found'
);

export const listLinesSchema = {
     tags: ['stocktakes'],
     summary: 'List the lines of a stocktake',
     params: stocktakeParams,
     response: {
          200: {
               description: 'Lines ordered by category and SKU',
               type: 'object',
               properties: {
                    stocktakeId: { type: 'integer' },
                    lines: { type: 'array', items: stocktakeLineSchema },
               },
          },
          404: stocktakeNotFound,
          500: internalErrorResponse,
     },
};

export const refreshMovementsSchema = {
     tags: ['stocktakes'],
     summary: 'Re-read ledger movements into every line',
     params: stocktakeParams,
     response: {
          200: {
               description: 'Lines recomputed',
               type: 'object',
               properties: {
                    stocktakeId: { type: 'integer' },
                    periodId: { type: 'integer' },
                    lineCount: { type: 'integer' },
               },
          },
          404: stocktakeNotFound,
          409: errorResponse('Period closed', 'PERIOD_LOCKED', 'Period 12 is closed'),
          500: internalErrorResponse,
     },
};

export const voiceCommandSchema = {
     tags: ['voice'],
     summary: 'Apply a parsed voice count command',
     description:
          'Takes the parsed command plus the fuzzy-match candidates scored upstream and records the count on the matched line.',
     params: stocktakeParams,
     body: {
          type: 'object',
          required: ['command', 'candidates'],
          properties: {
               command: {
                    type: 'object',
                    required: ['action', 'itemIdentifier'],
                    properties: {
                         action: { type: 'string', example: 'count' },
                         itemIdentifier: { type: 'string', example: 'gordons gin' },
                         fullUnits: { ...countBodyProperties.fullUnits, nullable: true, default: null },
                         partialUnits: {
                              ...countBodyProperties.partialUnits,
                              nullable: true,
                              default: null,
                         },
                    },
               },
               candidates: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['itemId', 'name', 'score'],
                         properties: {
                              itemId: { type: 'integer', minimum: 1 },
                              name: { type: 'string' },
                              score: { type: 'number', minimum: 0, maximum: 1 },
                         },
                    },
               },
          },
     },
     response: {
          200: {
               ...lineWriteResponse,
               description: 'Count recorded on the matched line',
               properties: {
                    ...lineWriteResponse.properties,
                    matchedItem: {
                         type: 'object',
                         properties: {
                              itemId: { type: 'integer' },
                              sku: { type: 'string' },
                              name: { type: 'string' },
                              score: { type: 'number' },
                         },
                    },
               },
          },
          400: errorResponse('Unsupported action or quantity', 'UNSUPPORTED_VOICE_ACTION', 'Voice action "delete" is not supported'),
          404: errorResponse('No matching item', 'NO_MATCH', 'No stocktake item matches "gin"'),
          409: errorResponse('Ambiguous item or locked line', 'AMBIGUOUS_ITEM', '"gin" matches Dry Gin 70cl / Pink Gin 70cl'),
          500: internalErrorResponse,
     },
};
