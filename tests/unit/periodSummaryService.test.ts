import { PeriodSummaryService } from '@stockroom/shared/src/services/period-summary-service';
import { PeriodNotFoundError } from '@stockroom/shared/src/utils/errors';
import {
     FakeMovementLedger,
     createMockClient,
     gin,
     lineRow,
     periodRow,
     stocktakeRow,
} from '../helpers/fixtures';

describe('PeriodSummaryService (Unit)', () => {
     let ledger: FakeMovementLedger;
     let service: PeriodSummaryService;
     let mockClient: ReturnType<typeof createMockClient>;

     beforeEach(() => {
          ledger = new FakeMovementLedger({ purchasesValue: 400, wasteValue: 20, salesValue: 1500 });
          service = new PeriodSummaryService(ledger);
          mockClient = createMockClient();
     });

     it('should recompute a draft period from its lines and the ledger', async () => {
          mockClient.query
               .mockResolvedValueOnce({ rows: [periodRow()] } as never)
               .mockResolvedValueOnce({ rows: [stocktakeRow()] } as never)
               .mockResolvedValueOnce({
                    rows: [
                         lineRow(gin, {
                              counted_full_units: '4',
                              counted_partial_units: '0',
                              opening_value: '36.00',
                              counted_value: '72.00',
                              expected_value: '54.00',
                              variance_value: '18.00',
                              manual_sales_value: '300.00',
                         }),
                    ],
               } as never);

          const summary = await service.getPeriodSummary(mockClient, 12);

          expect(summary).toEqual({
               periodId: 12,
               stocktakeId: 7,
               frozen: false,
               cogs: 420,
               revenue: 300,
               grossProfit: -120,
               grossProfitPct: -40,
               pourCostPct: 140,
               cogsSource: 'LEDGER',
               revenueSource: 'LINE_MANUAL_SALES',
               categories: [
                    {
                         category: 'SPIRITS',
                         lineCount: 1,
                         openingValue: 36,
                         countedValue: 72,
                         expectedValue: 54,
                         varianceValue: 18,
                    },
               ],
          });
          expect(ledger.ranges).toEqual([
               { hotelId: 1, startDate: '2026-03-01', endDate: '2026-03-31' },
          ]);
     });

     it('should answer a closed period from its frozen totals', async () => {
          mockClient.query
               .mockResolvedValueOnce({ rows: [periodRow({ is_closed: true })] } as never)
               .mockResolvedValueOnce({
                    rows: [
                         stocktakeRow({
                              status: 'APPROVED',
                              total_cogs: '420.00',
                              total_revenue: '1500.00',
                              gross_profit: '1080.00',
                              gross_profit_pct: '72.00',
                              pour_cost_pct: '28.00',
                              cogs_source: 'LEDGER',
                              revenue_source: 'LEDGER',
                              category_totals: [],
                         }),
                    ],
               } as never);
          // ledger has moved on since the close
          ledger.totals = { purchasesValue: 999, wasteValue: 0, salesValue: 1 };

          const summary = await service.getPeriodSummary(mockClient, 12);

          expect(summary).toMatchObject({
               frozen: true,
               cogs: 420,
               revenue: 1500,
               grossProfit: 1080,
               grossProfitPct: 72,
               pourCostPct: 28,
          });
          expect(ledger.ranges).toHaveLength(0);
          expect(mockClient.query).toHaveBeenCalledTimes(2);
     });

     it('should summarise a period without a stocktake from the ledger alone', async () => {
          ledger.totals = { purchasesValue: 0, wasteValue: 0, salesValue: 0 };
          mockClient.query
               .mockResolvedValueOnce({ rows: [periodRow()] } as never)
               .mockResolvedValueOnce({ rows: [] } as never);

          const summary = await service.getPeriodSummary(mockClient, 12);

          expect(summary).toEqual({
               periodId: 12,
               stocktakeId: null,
               frozen: false,
               cogs: 0,
               revenue: 0,
               grossProfit: 0,
               grossProfitPct: null,
               pourCostPct: null,
               cogsSource: 'LEDGER',
               revenueSource: 'LEDGER',
               categories: [],
          });
          expect(mockClient.query).toHaveBeenCalledTimes(2);
     });

     it('should prefer a period purchases override for COGS', async () => {
          mockClient.query
               .mockResolvedValueOnce({
                    rows: [periodRow({ manual_purchases_amount: '3200.00' })],
               } as never)
               .mockResolvedValueOnce({ rows: [] } as never);

          const summary = await service.getPeriodSummary(mockClient, 12);

          expect(summary.cogs).toBe(3200);
          expect(summary.cogsSource).toBe('PERIOD_MANUAL_PURCHASES');
     });

     it('should report an unknown period', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

          await expect(service.getPeriodSummary(mockClient, 404)).rejects.toThrow(PeriodNotFoundError);
     });
});
