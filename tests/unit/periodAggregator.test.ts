import {
     AggregationContext,
     AggregationLine,
     aggregatePeriod,
     categoryTotals,
     ledgerCogsTier,
     percentOfRevenue,
     REVENUE_CASCADE,
     resolveCascade,
} from '@stockroom/shared/src/valuation/period-aggregator';
import type { ItemCategory } from '@stockroom/shared/src/types/stocktake.types';

function line(category: ItemCategory, overrides: Partial<AggregationLine> = {}): AggregationLine {
     return {
          item: { category },
          manualPurchasesValue: null,
          manualWasteValue: null,
          manualSalesValue: null,
          openingValue: 0,
          countedValue: 0,
          expectedValue: 0,
          varianceValue: 0,
          ...overrides,
     };
}

function context(overrides: Partial<AggregationContext> = {}): AggregationContext {
     return {
          period: { manualPurchasesAmount: null, manualSalesAmount: null },
          lines: [line('SPIRITS'), line('WINE')],
          ledger: { purchasesValue: 1000, wasteValue: 50, salesValue: 4000 },
          ...overrides,
     };
}

describe('Period aggregator', () => {
     it('should fall back to the ledger when nothing is overridden', () => {
          const summary = aggregatePeriod(context());

          expect(summary).toMatchObject({
               cogs: 1050,
               revenue: 4000,
               grossProfit: 2950,
               grossProfitPct: 73.75,
               pourCostPct: 26.25,
               cogsSource: 'LEDGER',
               revenueSource: 'LEDGER',
          });
     });

     describe('COGS cascade', () => {
          it('should prefer the period purchases total over line values', () => {
               const summary = aggregatePeriod(
                    context({
                         period: { manualPurchasesAmount: 900, manualSalesAmount: null },
                         lines: [line('SPIRITS', { manualPurchasesValue: 300 })],
                    })
               );
               expect(summary.cogs).toBe(900);
               expect(summary.cogsSource).toBe('PERIOD_MANUAL_PURCHASES');
          });

          it('should sum line purchases and waste when the period total is unset', () => {
               const summary = aggregatePeriod(
                    context({
                         lines: [
                              line('SPIRITS', { manualPurchasesValue: 300 }),
                              line('WINE', { manualWasteValue: 20.5 }),
                              line('DRAFT'),
                         ],
                    })
               );
               expect(summary.cogs).toBe(320.5);
               expect(summary.cogsSource).toBe('LINE_MANUAL_PURCHASES_WASTE');
          });

          it('should take a zero period total as set', () => {
               const summary = aggregatePeriod(
                    context({ period: { manualPurchasesAmount: 0, manualSalesAmount: null } })
               );
               expect(summary.cogs).toBe(0);
               expect(summary.cogsSource).toBe('PERIOD_MANUAL_PURCHASES');
               expect(summary.pourCostPct).toBe(0);
          });
     });

     describe('revenue cascade', () => {
          it('should prefer line sales over the period sales total', () => {
               const summary = aggregatePeriod(
                    context({
                         period: { manualPurchasesAmount: null, manualSalesAmount: 9000 },
                         lines: [
                              line('SPIRITS', { manualSalesValue: 1500 }),
                              line('WINE', { manualSalesValue: 500 }),
                         ],
                    })
               );
               expect(summary.revenue).toBe(2000);
               expect(summary.revenueSource).toBe('LINE_MANUAL_SALES');
          });

          it('should use the period sales total when no line has sales', () => {
               const summary = aggregatePeriod(
                    context({ period: { manualPurchasesAmount: null, manualSalesAmount: 9000 } })
               );
               expect(summary.revenue).toBe(9000);
               expect(summary.revenueSource).toBe('PERIOD_MANUAL_SALES');
          });
     });

     it('should return null percentages when revenue is zero', () => {
          const summary = aggregatePeriod(
               context({ ledger: { purchasesValue: 200, wasteValue: 0, salesValue: 0 } })
          );

          expect(summary.revenue).toBe(0);
          expect(summary.grossProfit).toBe(-200);
          expect(summary.grossProfitPct).toBeNull();
          expect(summary.pourCostPct).toBeNull();
     });

     it('should total values per category in category order', () => {
          const totals = categoryTotals([
               line('WINE', { openingValue: 80, countedValue: 84, expectedValue: 90, varianceValue: -6 }),
               line('SPIRITS', { openingValue: 99, countedValue: 76.5, expectedValue: 81, varianceValue: -4.5 }),
               line('SPIRITS', { openingValue: 10.1, countedValue: null, expectedValue: 10.2, varianceValue: null }),
          ]);

          expect(totals).toEqual([
               {
                    category: 'SPIRITS',
                    lineCount: 2,
                    openingValue: 109.1,
                    countedValue: 76.5,
                    expectedValue: 91.2,
                    varianceValue: -4.5,
               },
               {
                    category: 'WINE',
                    lineCount: 1,
                    openingValue: 80,
                    countedValue: 84,
                    expectedValue: 90,
                    varianceValue: -6,
               },
          ]);
     });

     it('should accept the tiers as data', () => {
          const summary = aggregatePeriod(
               context({ period: { manualPurchasesAmount: 900, manualSalesAmount: null } }),
               { cogs: [ledgerCogsTier], revenue: REVENUE_CASCADE }
          );
          expect(summary.cogs).toBe(1050);
          expect(summary.cogsSource).toBe('LEDGER');
     });

     it('should fail when no tier resolves', () => {
          expect(() => resolveCascade([], context())).toThrow('resolved no amount');
     });

     it('should round percentages to two decimals', () => {
          expect(percentOfRevenue(1, 3)).toBe(33.33);
          expect(percentOfRevenue(5, 0)).toBeNull();
     });
});
