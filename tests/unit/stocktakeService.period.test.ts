import { StocktakeService } from '@stockroom/shared/src/services/stocktake-service';
import {
     InvalidOverrideError,
     InvalidPeriodError,
     InvalidQuantityError,
     LineLockedError,
     PeriodLockedError,
     PeriodNotFoundError,
     StocktakeAlreadyExistsError,
     StocktakeNotFoundError,
} from '@stockroom/shared/src/utils/errors';
import type { MovementQuantities } from '@stockroom/shared/src/types/stocktake.types';
import {
     FakeMovementLedger,
     createMockClient,
     gin,
     houseRed,
     lineRow,
     paramsOf,
     periodRow,
     sqlOf,
} from '../helpers/fixtures';

function movements(overrides: Partial<MovementQuantities>): MovementQuantities {
     return {
          purchasesQty: 0,
          salesQty: 0,
          wasteQty: 0,
          transfersInQty: 0,
          transfersOutQty: 0,
          adjustmentsQty: 0,
          ...overrides,
     };
}

describe('StocktakeService - Periods and Overrides (Unit)', () => {
     let ledger: FakeMovementLedger;
     let service: StocktakeService;
     let mockClient: ReturnType<typeof createMockClient>;

     beforeEach(() => {
          ledger = new FakeMovementLedger();
          service = new StocktakeService(ledger);
          mockClient = createMockClient();
     });

     describe('createPeriod', () => {
          it('should insert a valid period', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ id: '1' }] } as never)
                    .mockResolvedValueOnce({ rows: [periodRow()] } as never);

               const period = await service.createPeriod(mockClient, {
                    hotelId: 1,
                    name: ' March 2026 ',
                    startDate: '2026-03-01',
                    endDate: '2026-03-31',
               });

               expect(period).toMatchObject({
                    id: 12,
                    hotelId: 1,
                    name: 'March 2026',
                    startDate: '2026-03-01',
                    endDate: '2026-03-31',
                    isClosed: false,
                    manualPurchasesAmount: null,
               });
               expect(sqlOf(mockClient, 1)).toContain('INSERT INTO stock_period');
               expect(paramsOf(mockClient, 1)).toEqual([1, 'March 2026', '2026-03-01', '2026-03-31']);
          });

          it('should accept a single-day period', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ id: '1' }] } as never)
                    .mockResolvedValueOnce({
                         rows: [periodRow({ start_date: '2026-03-15', end_date: '2026-03-15' })],
                    } as never);

               const period = await service.createPeriod(mockClient, {
                    hotelId: 1,
                    name: 'Spot check',
                    startDate: '2026-03-15',
                    endDate: '2026-03-15',
               });
               expect(period.endDate).toBe('2026-03-15');
          });

          it('should reject a period that ends before it starts', async () => {
               await expect(
                    service.createPeriod(mockClient, {
                         hotelId: 1,
                         name: 'Backwards',
                         startDate: '2026-04-01',
                         endDate: '2026-03-31',
                    })
               ).rejects.toThrow('Period starts 2026-04-01 after it ends 2026-03-31');
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should reject dates that do not exist', async () => {
               await expect(
                    service.createPeriod(mockClient, {
                         hotelId: 1,
                         name: 'February',
                         startDate: '2026-02-01',
                         endDate: '2026-02-30',
                    })
               ).rejects.toThrow(InvalidPeriodError);
          });

          it('should reject a blank name', async () => {
               await expect(
                    service.createPeriod(mockClient, {
                         hotelId: 1,
                         name: '   ',
                         startDate: '2026-03-01',
                         endDate: '2026-03-31',
                    })
               ).rejects.toThrow('Period name is required');
          });

          it('should reject an unknown hotel', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(
                    service.createPeriod(mockClient, {
                         hotelId: 9,
                         name: 'March 2026',
                         startDate: '2026-03-01',
                         endDate: '2026-03-31',
                    })
               ).rejects.toThrow('Hotel 9 does not exist');
          });
     });

     describe('populateStocktake', () => {
          function mockPopulate() {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [periodRow()] } as never)
                    .mockResolvedValueOnce({ rows: [] } as never)
                    .mockResolvedValueOnce({ rows: [{ id: '7' }] } as never)
                    .mockResolvedValueOnce({ rows: [lineRow(gin), lineRow(houseRed)] } as never)
                    .mockResolvedValueOnce({
                         rows: [{ item_id: '11', counted_full_units: '4', counted_partial_units: '0.5' }],
                    } as never)
                    .mockResolvedValue({ rows: [] } as never);
          }

          it('should create one line per active item', async () => {
               ledger.movements.set(11, movements({ purchasesQty: 40, salesQty: 10 }));
               mockPopulate();

               const result = await service.populateStocktake(mockClient, 12);

               expect(result).toEqual({ stocktakeId: 7, periodId: 12, lineCount: 2 });
               expect(ledger.ranges).toEqual([
                    { hotelId: 1, startDate: '2026-03-01', endDate: '2026-03-31' },
               ]);
               expect(sqlOf(mockClient, 0)).toContain('FOR UPDATE');
               expect(paramsOf(mockClient, 4)).toEqual([1, '2026-03-01']);
          });

          it('should carry the previous count forward as the opening', async () => {
               ledger.movements.set(11, movements({ purchasesQty: 40, salesQty: 10 }));
               mockPopulate();

               await service.populateStocktake(mockClient, 12);

               expect(sqlOf(mockClient, 5)).toContain('INSERT INTO stocktake_line');
               expect(paramsOf(mockClient, 5)).toEqual([
                    7, 11,
                    4, 0.5,
                    null, null,
                    40, 10, 0, 0, 0, 0,
                    null, null, null,
                    90, null, 120, null,
                    81, null, 108, null,
               ]);
               // no earlier count and no movements
               expect(paramsOf(mockClient, 6)).toEqual([
                    7, 12,
                    0, 0,
                    null, null,
                    0, 0, 0, 0, 0, 0,
                    null, null, null,
                    0, null, 0, null,
                    0, null, 0, null,
               ]);
          });

          it('should queue a StocktakePopulated event', async () => {
               mockPopulate();

               await service.populateStocktake(mockClient, 12);

               expect(mockClient.query).toHaveBeenCalledTimes(8);
               expect(paramsOf(mockClient, 7)[0]).toBe('StocktakePopulated');
          });

          it('should refuse a closed period', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [periodRow({ is_closed: true })],
               } as never);

               await expect(service.populateStocktake(mockClient, 12)).rejects.toThrow(PeriodLockedError);
          });

          it('should refuse a second stocktake', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [periodRow()] } as never)
                    .mockResolvedValueOnce({ rows: [{ id: '7' }] } as never);

               const error = await service.populateStocktake(mockClient, 12).catch((e: unknown) => e);

               expect(error).toBeInstanceOf(StocktakeAlreadyExistsError);
               expect(error).toMatchObject({ periodId: 12, stocktakeId: 7 });
          });

          it('should report an unknown period', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(service.populateStocktake(mockClient, 404)).rejects.toThrow(
                    PeriodNotFoundError
               );
          });
     });

     describe('setManualOverride', () => {
          it('should reject a negative amount before touching the database', async () => {
               await expect(
                    service.setManualOverride(mockClient, {
                         scope: 'line',
                         targetId: 1001,
                         kind: 'sales',
                         amount: -5,
                    })
               ).rejects.toThrow(InvalidQuantityError);
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should reject a period-level waste override', async () => {
               await expect(
                    service.setManualOverride(mockClient, {
                         scope: 'period',
                         targetId: 12,
                         kind: 'waste',
                         amount: 10,
                    })
               ).rejects.toThrow(InvalidOverrideError);
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should store a period purchases total', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [periodRow()] } as never)
                    .mockResolvedValue({ rows: [] } as never);

               const result = await service.setManualOverride(mockClient, {
                    scope: 'period',
                    targetId: 12,
                    kind: 'purchases',
                    amount: 3200,
               });

               expect(result).toEqual({ scope: 'period', targetId: 12, kind: 'purchases', amount: 3200 });
               expect(sqlOf(mockClient, 0)).toContain('FOR UPDATE');
               expect(sqlOf(mockClient, 1)).toContain('SET manual_purchases_amount = $2');
               expect(paramsOf(mockClient, 1)).toEqual([12, 3200]);
               expect(paramsOf(mockClient, 2)[0]).toBe('PeriodOverrideSet');
          });

          it('should refuse a period override on a closed period', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [periodRow({ is_closed: true })],
               } as never);

               await expect(
                    service.setManualOverride(mockClient, {
                         scope: 'period',
                         targetId: 12,
                         kind: 'sales',
                         amount: 100,
                    })
               ).rejects.toThrow(PeriodLockedError);
          });

          it('should recompute the line with a sales override', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ period_id: '12', is_closed: false }] } as never)
                    .mockResolvedValueOnce({
                         rows: [lineRow(gin, { opening_full_units: '5', sales_qty: '60' })],
                    } as never)
                    .mockResolvedValue({ rows: [] } as never);

               const result = await service.setManualOverride(mockClient, {
                    scope: 'line',
                    targetId: 1001,
                    kind: 'sales',
                    amount: 30,
               });

               // 30 / menu price 6 = 5 servings sold instead of the ledger's 60
               expect(result.line?.manualSalesValue).toBe(30);
               expect(result.line?.expectedQty).toBe(95);
               expect(paramsOf(mockClient, 3)[0]).toBe('LineOverrideSet');
          });

          it('should fall back to the ledger when a line override is cleared', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ period_id: '12', is_closed: false }] } as never)
                    .mockResolvedValueOnce({
                         rows: [
                              lineRow(gin, {
                                   opening_full_units: '5',
                                   sales_qty: '60',
                                   manual_sales_value: '30.00',
                              }),
                         ],
                    } as never)
                    .mockResolvedValue({ rows: [] } as never);

               const result = await service.setManualOverride(mockClient, {
                    scope: 'line',
                    targetId: 1001,
                    kind: 'sales',
                    amount: null,
               });

               expect(result.line?.manualSalesValue).toBeNull();
               expect(result.line?.expectedQty).toBe(40);
          });

          it('should refuse a line override once the period is closed', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ period_id: '12', is_closed: true }],
               } as never);

               await expect(
                    service.setManualOverride(mockClient, {
                         scope: 'line',
                         targetId: 1001,
                         kind: 'purchases',
                         amount: 50,
                    })
               ).rejects.toThrow(LineLockedError);
          });
     });

     describe('refreshMovements', () => {
          const draftContext = {
               period_id: '12',
               hotel_id: '1',
               is_closed: false,
               start_date: '2026-03-01',
               end_date: '2026-03-31',
          };

          it('should rewrite ledger quantities and derived fields', async () => {
               ledger.movements.set(11, movements({ purchasesQty: 20, salesQty: 30 }));
               mockClient.query
                    .mockResolvedValueOnce({ rows: [draftContext] } as never)
                    .mockResolvedValueOnce({
                         rows: [
                              lineRow(gin, {
                                   opening_full_units: '2',
                                   counted_full_units: '4',
                                   counted_partial_units: '0',
                              }),
                              lineRow(houseRed, { id: '1002', purchases_qty: '5' }),
                         ],
                    } as never)
                    .mockResolvedValue({ rows: [] } as never);

               const result = await service.refreshMovements(mockClient, 7);

               expect(result).toEqual({ stocktakeId: 7, periodId: 12, lineCount: 2 });
               expect(sqlOf(mockClient, 0)).toContain('FOR SHARE OF p');
               const ginParams = paramsOf(mockClient, 2);
               expect(ginParams.slice(5, 11)).toEqual([20, 30, 0, 0, 0, 0]);
               // expected 40 + 20 - 30, counted 80
               expect(ginParams.slice(14, 18)).toEqual([40, 80, 30, 50]);
               // an item with no movements this period is reset to zero
               expect(paramsOf(mockClient, 3).slice(5, 11)).toEqual([0, 0, 0, 0, 0, 0]);
          });

          it('should refuse a closed period', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ ...draftContext, is_closed: true }],
               } as never);

               await expect(service.refreshMovements(mockClient, 7)).rejects.toThrow(PeriodLockedError);
          });

          it('should report an unknown stocktake', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(service.refreshMovements(mockClient, 70)).rejects.toThrow(
                    StocktakeNotFoundError
               );
          });
     });

     describe('getLines', () => {
          it('should map every line of the stocktake', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ id: '7' }] } as never)
                    .mockResolvedValueOnce({
                         rows: [lineRow(gin), lineRow(houseRed, { id: '1002' })],
                    } as never);

               const lines = await service.getLines(mockClient, 7);

               expect(lines.map((line) => [line.id, line.item.sku])).toEqual([
                    [1001, 'SPR-GIN-001'],
                    [1002, 'WIN-RED-001'],
               ]);
               expect(lines[0].item.unitCost).toBe(18);
               expect(lines[0].counted).toBeNull();
          });

          it('should report an unknown stocktake', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(service.getLines(mockClient, 70)).rejects.toThrow(
                    'Stocktake 70 not found'
               );
          });
     });

     describe('describeLine', () => {
          it('should break a counted line into natural units', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ id: '7' }] } as never)
                    .mockResolvedValueOnce({
                         rows: [
                              lineRow(gin, {
                                   counted_full_units: '3',
                                   counted_partial_units: '0.25',
                                   counted_qty: '65.0000',
                              }),
                              lineRow(houseRed, { id: '1002' }),
                         ],
                    } as never);

               const [counted, uncounted] = (await service.getLines(mockClient, 7)).map((line) =>
                    service.describeLine(line)
               );

               expect(counted.displayBreakdown).toEqual({
                    full: 3,
                    partial: 0.25,
                    fullLabel: 'bottles',
                    partialLabel: 'bottle fraction',
               });
               expect(uncounted.displayBreakdown).toBeNull();
          });
     });
});
