import {
     countBodyProperties,
     errorResponse,
     internalErrorResponse,
     idParams,
     lineWriteResponse,
} from './common.schemas';

const lineParams = idParams('lineId', 'Stocktake line id');

const countBody = {
     type: 'object',
     required: ['fullUnits', 'partialUnits'],
     properties: {
          ...countBodyProperties,
          entryMode: {
               type: 'string',
               enum: ['CASES_AND_BOTTLES', 'TOTAL_BOTTLES'],
               description: 'TOTAL_BOTTLES (juices) takes a raw bottle count in partialUnits',
          },
     },
};

const countErrors = {
     400: errorResponse('Invalid quantity', 'FRACTION_OUT_OF_RANGE', 'Partial bottle fraction must be between 0 and 0.99, got 1.2'),
     404: errorResponse('Line not found', 'LINE_NOT_FOUND', 'Stocktake line 1001 not found'),
     409: errorResponse('Period closed', 'LINE_LOCKED', 'Stocktake line 1001 belongs to closed period 12'),
     422: errorResponse('Item misconfigured', 'INVALID_ITEM_CONFIGURATION', 'Item JUI-ORA-001: unitsPerCase must be a positive number'),
     500: internalErrorResponse,
};

export const recordCountSchema = {
     tags: ['lines'],
     summary: 'Record the closing count of a line',
     description: 'Idempotent: the same pair always yields the same derived fields.',
     params: lineParams,
     body: countBody,
     response: { 200: lineWriteResponse, ...countErrors },
};

export const recordOpeningSchema = {
     tags: ['lines'],
     summary: 'Correct the opening count of a line',
     params: lineParams,
     body: countBody,
     response: { 200: lineWriteResponse, ...countErrors },
};

export const lineOverrideSchema = {
     tags: ['overrides'],
     summary: 'Set or clear a line-level manual value',
     params: {
          type: 'object',
          required: ['lineId', 'kind'],
          properties: {
               lineId: { type: 'integer', minimum: 1 },
               kind: { type: 'string', enum: ['purchases', 'waste', 'sales'] },
          },
     },
     body: {
          type: 'object',
          required: ['amount'],
          properties: {
               amount: {
                    type: 'number',
                    nullable: true,
                    description: 'Money amount; null clears the override',
                    example: 120,
               },
          },
     },
     response: {
          200: {
               description: 'Override stored and line recomputed',
               type: 'object',
               properties: {
                    scope: { type: 'string', example: 'line' },
                    targetId: { type: 'integer' },
                    kind: { type: 'string' },
                    amount: { type: 'number', nullable: true },
                    line: lineWriteResponse.properties.line,
               },
          },
          ...countErrors,
     },
};
