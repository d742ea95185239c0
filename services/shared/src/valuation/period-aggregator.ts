import {
     CategoryTotals,
     CogsSource,
     ITEM_CATEGORIES,
     ItemCategory,
     LedgerTotals,
     LineDerived,
     LineOverrides,
     PeriodSummary,
     RevenueSource,
     StockItem,
     StockPeriod,
} from '../types/stocktake.types';
import { roundMoney, roundTo, sum } from '../utils/math';

export interface AggregationLine
     extends LineOverrides,
          Pick<LineDerived, 'openingValue' | 'countedValue' | 'expectedValue' | 'varianceValue'> {
     item: Pick<StockItem, 'category'>;
}

export interface AggregationContext {
     period: Pick<StockPeriod, 'manualPurchasesAmount' | 'manualSalesAmount'>;
     lines: AggregationLine[];
     ledger: LedgerTotals;
}

/** One source in an override cascade; null means "not present, ask the next tier". */
export interface CascadeTier<TSource extends string> {
     source: TSource;
     resolve(context: AggregationContext): number | null;
}

export interface CascadeResult<TSource extends string> {
     amount: number;
     source: TSource;
}

function sumLineOverrides(
     lines: AggregationLine[],
     pick: (line: AggregationLine) => Array<number | null>
): number | null {
     const values = lines.flatMap(pick);
     if (values.every((value) => value === null)) {
          return null;
     }
     return sum(values.map((value) => value ?? 0));
}

export const periodManualPurchasesTier: CascadeTier<CogsSource> = {
     source: 'PERIOD_MANUAL_PURCHASES',
     resolve: ({ period }) => period.manualPurchasesAmount,
};

export const lineManualPurchasesWasteTier: CascadeTier<CogsSource> = {
     source: 'LINE_MANUAL_PURCHASES_WASTE',
     resolve: ({ lines }) =>
          sumLineOverrides(lines, (line) => [line.manualPurchasesValue, line.manualWasteValue]),
};

export const ledgerCogsTier: CascadeTier<CogsSource> = {
     source: 'LEDGER',
     resolve: ({ ledger }) => ledger.purchasesValue + ledger.wasteValue,
};

export const lineManualSalesTier: CascadeTier<RevenueSource> = {
     source: 'LINE_MANUAL_SALES',
     resolve: ({ lines }) => sumLineOverrides(lines, (line) => [line.manualSalesValue]),
};

export const periodManualSalesTier: CascadeTier<RevenueSource> = {
     source: 'PERIOD_MANUAL_SALES',
     resolve: ({ period }) => period.manualSalesAmount,
};

export const ledgerRevenueTier: CascadeTier<RevenueSource> = {
     source: 'LEDGER',
     resolve: ({ ledger }) => ledger.salesValue,
};

// Purchases prefer the period figure, sales prefer line overrides.
export const COGS_CASCADE: readonly CascadeTier<CogsSource>[] = [
     periodManualPurchasesTier,
     lineManualPurchasesWasteTier,
     ledgerCogsTier,
];

export const REVENUE_CASCADE: readonly CascadeTier<RevenueSource>[] = [
     lineManualSalesTier,
     periodManualSalesTier,
     ledgerRevenueTier,
];

export function resolveCascade<TSource extends string>(
     tiers: readonly CascadeTier<TSource>[],
     context: AggregationContext
): CascadeResult<TSource> {
     for (const tier of tiers) {
          const amount = tier.resolve(context);
          if (amount !== null) {
               return { amount: roundMoney(amount), source: tier.source };
          }
     }
     throw new Error(`Cascade [${tiers.map((t) => t.source).join(', ')}] resolved no amount`);
}

/** Percentage of revenue; null when revenue is zero. */
export function percentOfRevenue(amount: number, revenue: number): number | null {
     if (revenue === 0) {
          return null;
     }
     return roundTo((amount / revenue) * 100, 2);
}

export function categoryTotals(lines: AggregationLine[]): CategoryTotals[] {
     const byCategory = new Map<ItemCategory, CategoryTotals>();

     for (const line of lines) {
          const category = line.item.category;
          const totals = byCategory.get(category) ?? {
               category,
               lineCount: 0,
               openingValue: 0,
               countedValue: 0,
               expectedValue: 0,
               varianceValue: 0,
          };
          totals.lineCount += 1;
          totals.openingValue += line.openingValue;
          totals.countedValue += line.countedValue ?? 0;
          totals.expectedValue += line.expectedValue;
          totals.varianceValue += line.varianceValue ?? 0;
          byCategory.set(category, totals);
     }

     return ITEM_CATEGORIES.flatMap((category) => {
          const totals = byCategory.get(category);
          if (!totals) {
               return [];
          }
          return [
               {
                    ...totals,
                    openingValue: roundMoney(totals.openingValue),
                    countedValue: roundMoney(totals.countedValue),
                    expectedValue: roundMoney(totals.expectedValue),
                    varianceValue: roundMoney(totals.varianceValue),
               },
          ];
     });
}

/** Period-level COGS, revenue and margins from stored line values and ledger totals. */
export function aggregatePeriod(
     context: AggregationContext,
     cascades: {
          cogs: readonly CascadeTier<CogsSource>[];
          revenue: readonly CascadeTier<RevenueSource>[];
     } = { cogs: COGS_CASCADE, revenue: REVENUE_CASCADE }
): PeriodSummary {
     const cogs = resolveCascade(cascades.cogs, context);
     const revenue = resolveCascade(cascades.revenue, context);
     const grossProfit = roundMoney(revenue.amount - cogs.amount);

     return {
          cogs: cogs.amount,
          revenue: revenue.amount,
          grossProfit,
          grossProfitPct: percentOfRevenue(grossProfit, revenue.amount),
          pourCostPct: percentOfRevenue(cogs.amount, revenue.amount),
          cogsSource: cogs.source,
          revenueSource: revenue.source,
          categories: categoryTotals(context.lines),
     };
}
