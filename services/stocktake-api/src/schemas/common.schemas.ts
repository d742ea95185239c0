// Building blocks shared by the route schemas

export function errorResponse(description: string, code: string, message: string) {
     return {
          description,
          type: 'object',
          // ambiguity and incomplete-count errors carry extra detail
          additionalProperties: true,
          properties: {
               error: { type: 'string', example: code },
               message: { type: 'string', example: message },
          },
     };
}

export const internalErrorResponse = errorResponse(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

export function idParams(name: string, description: string) {
     return {
          type: 'object',
          required: [name],
          properties: {
               [name]: { type: 'integer', minimum: 1, description, example: 42 },
          },
     };
}

const nullableNumber = { type: 'number', nullable: true };

export const unitBreakdownSchema = {
     type: 'object',
     properties: {
          full: { type: 'number', example: 3 },
          partial: { type: 'number', example: 3.5 },
          fullLabel: { type: 'string', example: 'cases' },
          partialLabel: { type: 'string', example: 'bottles' },
          bottles: { type: 'number', example: 3 },
          ml: { type: 'number', example: 500 },
     },
};

const rawCountSchema = {
     type: 'object',
     properties: {
          fullUnits: { type: 'number' },
          partialUnits: { type: 'number' },
     },
};

export const stocktakeLineSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 1001 },
          stocktakeId: { type: 'integer', example: 7 },
          item: {
               type: 'object',
               properties: {
                    id: { type: 'integer' },
                    sku: { type: 'string', example: 'SPR-GIN-001' },
                    name: { type: 'string', example: 'Dry Gin 70cl' },
                    category: { type: 'string', example: 'SPIRITS' },
                    subcategory: { type: 'string' },
                    uom: { type: 'number', example: 20 },
                    unitsPerCase: { type: 'number' },
                    servingSizeMl: { type: 'number' },
                    unitCost: { type: 'number', example: 18.5 },
                    menuPrice: { type: 'number' },
               },
          },
          opening: rawCountSchema,
          counted: { ...rawCountSchema, nullable: true },
          purchasesQty: { type: 'number' },
          salesQty: { type: 'number' },
          wasteQty: { type: 'number' },
          transfersInQty: { type: 'number' },
          transfersOutQty: { type: 'number' },
          adjustmentsQty: { type: 'number' },
          manualPurchasesValue: nullableNumber,
          manualWasteValue: nullableNumber,
          manualSalesValue: nullableNumber,
          openingQty: { type: 'number' },
          countedQty: nullableNumber,
          expectedQty: { type: 'number' },
          varianceQty: nullableNumber,
          openingValue: { type: 'number' },
          countedValue: nullableNumber,
          expectedValue: { type: 'number' },
          varianceValue: nullableNumber,
          displayBreakdown: { ...unitBreakdownSchema, nullable: true },
     },
};

export const lineWriteResponse = {
     description: 'Line recomputed',
     type: 'object',
     properties: {
          canonicalQty: { type: 'number', example: 65 },
          value: { type: 'number', example: 60.13 },
          displayBreakdown: unitBreakdownSchema,
          line: stocktakeLineSchema,
     },
};

export const countBodyProperties = {
     fullUnits: {
          type: 'number',
          description: 'Whole containers (bottles, kegs, cases)',
          example: 3,
     },
     partialUnits: {
          type: 'number',
          description: 'Bottle fraction, loose pints or loose bottles, depending on category',
          example: 0.25,
     },
};

export const periodSummarySchema = {
     type: 'object',
     properties: {
          periodId: { type: 'integer', example: 12 },
          stocktakeId: { type: 'integer', nullable: true, example: 7 },
          frozen: { type: 'boolean', example: false },
          cogs: { type: 'number', example: 4210.5 },
          revenue: { type: 'number', example: 15890 },
          grossProfit: { type: 'number', example: 11679.5 },
          grossProfitPct: { ...nullableNumber, example: 73.5 },
          pourCostPct: { ...nullableNumber, example: 26.5 },
          cogsSource: { type: 'string', example: 'LEDGER' },
          revenueSource: { type: 'string', example: 'LINE_MANUAL_SALES' },
          categories: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         category: { type: 'string', example: 'SPIRITS' },
                         lineCount: { type: 'integer' },
                         openingValue: { type: 'number' },
                         countedValue: { type: 'number' },
                         expectedValue: { type: 'number' },
                         varianceValue: { type: 'number' },
                    },
               },
          },
     },
};
