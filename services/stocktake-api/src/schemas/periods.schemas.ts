import {
     errorResponse,
     idParams,
     internalErrorResponse,
     periodSummarySchema,
} from './common.schemas';

const periodParams = idParams('periodId', 'Stock period id');

const periodSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 12 },
          hotelId: { type: 'integer', example: 1 },
          name: { type: 'string', example: 'March 2026' },
          startDate: { type: 'string', example: '2026-03-01' },
          endDate: { type: 'string', example: '2026-03-31' },
          isClosed: { type: 'boolean', example: false },
          manualPurchasesAmount: { type: 'number', nullable: true },
          manualSalesAmount: { type: 'number', nullable: true },
          closedAt: { type: 'string', format: 'date-time' },
          closedBy: { type: 'string' },
          reopenedAt: { type: 'string', format: 'date-time' },
          reopenedBy: { type: 'string' },
     },
};

const periodNotFound = errorResponse('Period not found', 'PERIOD_NOT_FOUND', 'Period 12 not found');

const actorBody = {
     type: 'object',
     required: ['actor'],
     properties: {
          actor: {
               type: 'string',
               minLength: 1,
               description: 'User performing the transition',
               example: 'manager@example.com',
          },
     },
};

export const createPeriodSchema = {
     tags: ['periods'],
     summary: 'Create a stock period',
     body: {
          type: 'object',
          required: ['hotelId', 'name', 'startDate', 'endDate'],
          properties: {
               hotelId: { type: 'integer', minimum: 1, example: 1 },
               name: { type: 'string', minLength: 1, example: 'March 2026' },
               startDate: { type: 'string', description: 'YYYY-MM-DD', example: '2026-03-01' },
               endDate: { type: 'string', description: 'YYYY-MM-DD', example: '2026-03-31' },
          },
     },
     response: {
          201: { description: 'Period created', ...periodSchema },
          400: errorResponse('Invalid period', 'INVALID_PERIOD', 'Period starts 2026-04-01 after it ends 2026-03-31'),
          500: internalErrorResponse,
     },
};

export const populateStocktakeSchema = {
     tags: ['periods'],
     summary: 'Create the stocktake for a period',
     description:
          'Creates one line per active item. Opening counts carry forward from the latest earlier count; movement quantities come from the ledger.',
     params: periodParams,
     response: {
          201: {
               description: 'Stocktake created',
               type: 'object',
               properties: {
                    stocktakeId: { type: 'integer', example: 7 },
                    periodId: { type: 'integer', example: 12 },
                    lineCount: { type: 'integer', example: 148 },
               },
          },
          404: periodNotFound,
          409: errorResponse('Period closed or stocktake exists', 'STOCKTAKE_ALREADY_EXISTS', 'Period 12 already has stocktake 7'),
          500: internalErrorResponse,
     },
};

export const periodSummaryRouteSchema = {
     tags: ['periods'],
     summary: 'Period COGS, revenue and margins',
     description:
          'Recomputed on every read while the period is open; the frozen close-time totals once it is closed.',
     params: periodParams,
     response: {
          200: { description: 'Period summary', ...periodSummarySchema },
          404: periodNotFound,
          422: errorResponse('Item misconfigured', 'INVALID_ITEM_CONFIGURATION', 'Item WIN-001: wine uom must be 1'),
          500: internalErrorResponse,
     },
};

export const periodOverrideSchema = {
     tags: ['overrides'],
     summary: 'Set or clear a period-level manual total',
     params: {
          type: 'object',
          required: ['periodId', 'kind'],
          properties: {
               periodId: { type: 'integer', minimum: 1 },
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
                    example: 3200,
               },
          },
     },
     response: {
          200: {
               description: 'Override stored',
               type: 'object',
               properties: {
                    scope: { type: 'string', example: 'period' },
                    targetId: { type: 'integer', example: 12 },
                    kind: { type: 'string', example: 'purchases' },
                    amount: { type: 'number', nullable: true, example: 3200 },
               },
          },
          400: errorResponse('Invalid override', 'INVALID_OVERRIDE', 'Period overrides accept purchases or sales, not waste'),
          404: periodNotFound,
          409: errorResponse('Period closed', 'PERIOD_LOCKED', 'Period 12 is closed'),
          500: internalErrorResponse,
     },
};

export const closePeriodSchema = {
     tags: ['lifecycle'],
     summary: 'Close a period and freeze its totals',
     params: periodParams,
     body: actorBody,
     response: {
          200: {
               description: 'Period closed',
               type: 'object',
               properties: {
                    periodId: { type: 'integer' },
                    stocktakeId: { type: 'integer' },
                    closedAt: { type: 'string', format: 'date-time' },
                    closedBy: { type: 'string' },
                    summary: periodSummarySchema,
               },
          },
          404: periodNotFound,
          409: errorResponse('Period cannot be closed', 'INCOMPLETE_COUNT', 'Period 12 has 1 uncounted line(s): SPR-GIN-001'),
          500: internalErrorResponse,
     },
};

export const reopenPeriodSchema = {
     tags: ['lifecycle'],
     summary: 'Reopen a closed period',
     params: periodParams,
     body: actorBody,
     response: {
          200: {
               description: 'Period reopened',
               type: 'object',
               properties: {
                    periodId: { type: 'integer' },
                    reopenedAt: { type: 'string', format: 'date-time' },
                    reopenedBy: { type: 'string' },
               },
          },
          404: periodNotFound,
          409: errorResponse('Period not closed', 'NOT_CLOSED', 'Period 12 is not closed'),
          500: internalErrorResponse,
     },
};

export const periodHistorySchema = {
     tags: ['lifecycle'],
     summary: 'Close and reopen history of a period',
     params: periodParams,
     response: {
          200: {
               description: 'Audit entries, oldest first',
               type: 'object',
               properties: {
                    periodId: { type: 'integer' },
                    entries: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'integer' },
                                   action: { type: 'string', example: 'CLOSED' },
                                   actor: { type: 'string' },
                                   occurredAt: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          404: periodNotFound,
          500: internalErrorResponse,
     },
};
