import type { PoolClient } from 'pg';
import type { LedgerRange, MovementLedger } from '@stockroom/shared/src/clients/movement-ledger';
import type {
     StockPeriodRow,
     StocktakeLineRow,
     StocktakeRow,
} from '@stockroom/shared/src/db/rows';
import type {
     LedgerTotals,
     MovementQuantities,
     StockItem,
} from '@stockroom/shared/src/types/stocktake.types';

export function createMockClient(): jest.Mocked<PoolClient> {
     return {
          query: jest.fn(),
     } as unknown as jest.Mocked<PoolClient>;
}

export const gin: StockItem = {
     id: 11,
     hotelId: 1,
     sku: 'SPR-GIN-001',
     name: 'Dry Gin 70cl',
     category: 'SPIRITS',
     uom: 20,
     unitCost: 18,
     menuPrice: 6,
     active: true,
};

export const houseRed: StockItem = {
     id: 12,
     hotelId: 1,
     sku: 'WIN-RED-001',
     name: 'House Red 75cl',
     category: 'WINE',
     uom: 1,
     unitCost: 8,
     menuPrice: 28,
     active: true,
};

export const lagerKeg: StockItem = {
     id: 13,
     hotelId: 1,
     sku: 'DRF-LAG-001',
     name: 'Lager 50L Keg',
     category: 'DRAFT',
     uom: 88,
     unitCost: 176,
     menuPrice: 6,
     active: true,
};

export const bottledLager: StockItem = {
     id: 14,
     hotelId: 1,
     sku: 'BTL-BEE-001',
     name: 'Bottled Lager 330ml',
     category: 'BOTTLED',
     uom: 1,
     unitsPerCase: 24,
     unitCost: 24,
     menuPrice: 5,
     active: true,
};

export const orangeJuice: StockItem = {
     id: 15,
     hotelId: 1,
     sku: 'JUI-ORA-001',
     name: 'Orange Juice 1L',
     category: 'JUICE',
     uom: 1000,
     unitsPerCase: 12,
     servingSizeMl: 200,
     unitCost: 24,
     menuPrice: 3,
     active: true,
};

export const grenadine: StockItem = {
     id: 16,
     hotelId: 1,
     sku: 'SYR-GRE-001',
     name: 'Grenadine 70cl',
     category: 'SYRUP',
     uom: 700,
     servingSizeMl: 35,
     unitCost: 10,
     active: true,
};

/** A stocktake line row as PostgreSQL returns it: ids and NUMERICs as strings. */
export function lineRow(
     item: StockItem,
     overrides: Partial<StocktakeLineRow> = {}
): StocktakeLineRow {
     return {
          id: '1001',
          stocktake_id: '7',
          item_id: String(item.id),
          item_hotel_id: String(item.hotelId),
          sku: item.sku,
          item_name: item.name,
          category: item.category,
          subcategory: item.subcategory ?? null,
          uom: String(item.uom),
          units_per_case: item.unitsPerCase === undefined ? null : String(item.unitsPerCase),
          serving_size_ml: item.servingSizeMl === undefined ? null : String(item.servingSizeMl),
          unit_cost: String(item.unitCost),
          menu_price: item.menuPrice === undefined ? null : String(item.menuPrice),
          active: item.active,
          opening_full_units: '0',
          opening_partial_units: '0',
          counted_full_units: null,
          counted_partial_units: null,
          purchases_qty: '0',
          sales_qty: '0',
          waste_qty: '0',
          transfers_in_qty: '0',
          transfers_out_qty: '0',
          adjustments_qty: '0',
          manual_purchases_value: null,
          manual_waste_value: null,
          manual_sales_value: null,
          opening_qty: '0',
          counted_qty: null,
          expected_qty: '0',
          variance_qty: null,
          opening_value: '0',
          counted_value: null,
          expected_value: '0',
          variance_value: null,
          ...overrides,
     };
}

export function periodRow(overrides: Partial<StockPeriodRow> = {}): StockPeriodRow {
     return {
          id: '12',
          hotel_id: '1',
          name: 'March 2026',
          start_date: '2026-03-01',
          end_date: '2026-03-31',
          is_closed: false,
          manual_purchases_amount: null,
          manual_sales_amount: null,
          closed_at: null,
          closed_by: null,
          reopened_at: null,
          reopened_by: null,
          ...overrides,
     };
}

export function stocktakeRow(overrides: Partial<StocktakeRow> = {}): StocktakeRow {
     return {
          id: '7',
          hotel_id: '1',
          period_id: '12',
          status: 'DRAFT',
          total_cogs: null,
          total_revenue: null,
          gross_profit: null,
          gross_profit_pct: null,
          pour_cost_pct: null,
          cogs_source: null,
          revenue_source: null,
          category_totals: null,
          approved_at: null,
          approved_by: null,
          ...overrides,
     };
}

/** In-process ledger with fixed answers. */
export class FakeMovementLedger implements MovementLedger {
     readonly ranges: LedgerRange[] = [];

     constructor(
          public totals: LedgerTotals = { purchasesValue: 0, wasteValue: 0, salesValue: 0 },
          public movements = new Map<number, MovementQuantities>()
     ) {}

     async getPeriodTotals(_client: PoolClient, range: LedgerRange): Promise<LedgerTotals> {
          this.ranges.push(range);
          return this.totals;
     }

     async getItemMovements(
          _client: PoolClient,
          range: LedgerRange
     ): Promise<Map<number, MovementQuantities>> {
          this.ranges.push(range);
          return this.movements;
     }
}

/** SQL text of the nth query the mock received. */
export function sqlOf(client: jest.Mocked<PoolClient>, index: number): string {
     const call = client.query.mock.calls[index];
     return String(call?.[0] ?? '');
}

/** Parameters of the nth query the mock received. */
export function paramsOf(client: jest.Mocked<PoolClient>, index: number): unknown[] {
     const params: unknown = client.query.mock.calls[index]?.[1];
     return Array.isArray(params) ? params : [];
}

/** Stand-in for withTransaction/withConnection that hands every callback the same client. */
export function runWith(client: PoolClient) {
     return <T>(fn: (client: PoolClient) => Promise<T>): Promise<T> => fn(client);
}
