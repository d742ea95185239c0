import {
     CategoryTotals,
     CogsSource,
     ItemCategory,
     PeriodAuditAction,
     PeriodAuditEntry,
     PeriodSummary,
     RawCount,
     RevenueSource,
     StockItem,
     StockPeriod,
     Stocktake,
     StocktakeLine,
     StocktakeStatus,
} from '../types/stocktake.types';
import { toNumber } from '../utils/math';

// PostgreSQL returns BIGINT and NUMERIC as strings
type Numeric = string | number;

export function toId(value: Numeric): number {
     return parseInt(String(value), 10);
}

function num(value: Numeric | null): number {
     return toNumber(value) ?? 0;
}

function optional<T>(value: T | null): T | undefined {
     return value === null ? undefined : value;
}

export interface StockItemRow {
     item_id: Numeric;
     item_hotel_id: Numeric;
     sku: string;
     item_name: string;
     category: ItemCategory;
     subcategory: string | null;
     uom: Numeric;
     units_per_case: Numeric | null;
     serving_size_ml: Numeric | null;
     unit_cost: Numeric;
     menu_price: Numeric | null;
     active: boolean;
}

export const ITEM_COLUMNS = `
        i.id AS item_id,
        i.hotel_id AS item_hotel_id,
        i.sku,
        i.name AS item_name,
        i.category,
        i.subcategory,
        i.uom,
        i.units_per_case,
        i.serving_size_ml,
        i.unit_cost,
        i.menu_price,
        i.active`;

export function mapStockItem(row: StockItemRow): StockItem {
     return {
          id: toId(row.item_id),
          hotelId: toId(row.item_hotel_id),
          sku: row.sku,
          name: row.item_name,
          category: row.category,
          subcategory: optional(row.subcategory),
          uom: num(row.uom),
          unitsPerCase: optional(toNumber(row.units_per_case)),
          servingSizeMl: optional(toNumber(row.serving_size_ml)),
          unitCost: num(row.unit_cost),
          menuPrice: optional(toNumber(row.menu_price)),
          active: row.active,
     };
}

export interface StocktakeLineRow extends StockItemRow {
     id: Numeric;
     stocktake_id: Numeric;
     opening_full_units: Numeric;
     opening_partial_units: Numeric;
     counted_full_units: Numeric | null;
     counted_partial_units: Numeric | null;
     purchases_qty: Numeric;
     sales_qty: Numeric;
     waste_qty: Numeric;
     transfers_in_qty: Numeric;
     transfers_out_qty: Numeric;
     adjustments_qty: Numeric;
     manual_purchases_value: Numeric | null;
     manual_waste_value: Numeric | null;
     manual_sales_value: Numeric | null;
     opening_qty: Numeric;
     counted_qty: Numeric | null;
     expected_qty: Numeric;
     variance_qty: Numeric | null;
     opening_value: Numeric;
     counted_value: Numeric | null;
     expected_value: Numeric;
     variance_value: Numeric | null;
}

export const LINE_SELECT = `
      SELECT
        l.id,
        l.stocktake_id,
        l.opening_full_units,
        l.opening_partial_units,
        l.counted_full_units,
        l.counted_partial_units,
        l.purchases_qty,
        l.sales_qty,
        l.waste_qty,
        l.transfers_in_qty,
        l.transfers_out_qty,
        l.adjustments_qty,
        l.manual_purchases_value,
        l.manual_waste_value,
        l.manual_sales_value,
        l.opening_qty,
        l.counted_qty,
        l.expected_qty,
        l.variance_qty,
        l.opening_value,
        l.counted_value,
        l.expected_value,
        l.variance_value,${ITEM_COLUMNS}
      FROM stocktake_line l
      JOIN stock_item i ON i.id = l.item_id`;

function countedPair(row: StocktakeLineRow): RawCount | null {
     const fullUnits = toNumber(row.counted_full_units);
     const partialUnits = toNumber(row.counted_partial_units);
     if (fullUnits === null || partialUnits === null) {
          return null;
     }
     return { fullUnits, partialUnits };
}

export function mapStocktakeLine(row: StocktakeLineRow): StocktakeLine {
     return {
          id: toId(row.id),
          stocktakeId: toId(row.stocktake_id),
          item: mapStockItem(row),
          opening: {
               fullUnits: num(row.opening_full_units),
               partialUnits: num(row.opening_partial_units),
          },
          counted: countedPair(row),
          purchasesQty: num(row.purchases_qty),
          salesQty: num(row.sales_qty),
          wasteQty: num(row.waste_qty),
          transfersInQty: num(row.transfers_in_qty),
          transfersOutQty: num(row.transfers_out_qty),
          adjustmentsQty: num(row.adjustments_qty),
          manualPurchasesValue: toNumber(row.manual_purchases_value),
          manualWasteValue: toNumber(row.manual_waste_value),
          manualSalesValue: toNumber(row.manual_sales_value),
          openingQty: num(row.opening_qty),
          countedQty: toNumber(row.counted_qty),
          expectedQty: num(row.expected_qty),
          varianceQty: toNumber(row.variance_qty),
          openingValue: num(row.opening_value),
          countedValue: toNumber(row.counted_value),
          expectedValue: num(row.expected_value),
          varianceValue: toNumber(row.variance_value),
     };
}

/** Column values for every stored field of a line, in UPDATE/INSERT parameter order. */
export function lineColumnValues(line: Omit<StocktakeLine, 'id' | 'stocktakeId' | 'item'>) {
     return [
          line.opening.fullUnits,
          line.opening.partialUnits,
          line.counted?.fullUnits ?? null,
          line.counted?.partialUnits ?? null,
          line.purchasesQty,
          line.salesQty,
          line.wasteQty,
          line.transfersInQty,
          line.transfersOutQty,
          line.adjustmentsQty,
          line.manualPurchasesValue,
          line.manualWasteValue,
          line.manualSalesValue,
          line.openingQty,
          line.countedQty,
          line.expectedQty,
          line.varianceQty,
          line.openingValue,
          line.countedValue,
          line.expectedValue,
          line.varianceValue,
     ];
}

export const LINE_VALUE_COLUMNS = [
     'opening_full_units',
     'opening_partial_units',
     'counted_full_units',
     'counted_partial_units',
     'purchases_qty',
     'sales_qty',
     'waste_qty',
     'transfers_in_qty',
     'transfers_out_qty',
     'adjustments_qty',
     'manual_purchases_value',
     'manual_waste_value',
     'manual_sales_value',
     'opening_qty',
     'counted_qty',
     'expected_qty',
     'variance_qty',
     'opening_value',
     'counted_value',
     'expected_value',
     'variance_value',
] as const;

export interface StockPeriodRow {
     id: Numeric;
     hotel_id: Numeric;
     name: string;
     start_date: string;
     end_date: string;
     is_closed: boolean;
     manual_purchases_amount: Numeric | null;
     manual_sales_amount: Numeric | null;
     closed_at: Date | null;
     closed_by: string | null;
     reopened_at: Date | null;
     reopened_by: string | null;
}

// DATE columns are cast to text so no timezone shifts a period boundary
export const PERIOD_SELECT = `
      SELECT
        p.id,
        p.hotel_id,
        p.name,
        p.start_date::text AS start_date,
        p.end_date::text AS end_date,
        p.is_closed,
        p.manual_purchases_amount,
        p.manual_sales_amount,
        p.closed_at,
        p.closed_by,
        p.reopened_at,
        p.reopened_by
      FROM stock_period p`;

export function mapStockPeriod(row: StockPeriodRow): StockPeriod {
     return {
          id: toId(row.id),
          hotelId: toId(row.hotel_id),
          name: row.name,
          startDate: row.start_date,
          endDate: row.end_date,
          isClosed: row.is_closed,
          manualPurchasesAmount: toNumber(row.manual_purchases_amount),
          manualSalesAmount: toNumber(row.manual_sales_amount),
          closedAt: optional(row.closed_at),
          closedBy: optional(row.closed_by),
          reopenedAt: optional(row.reopened_at),
          reopenedBy: optional(row.reopened_by),
     };
}

export interface StocktakeRow {
     id: Numeric;
     hotel_id: Numeric;
     period_id: Numeric;
     status: StocktakeStatus;
     total_cogs: Numeric | null;
     total_revenue: Numeric | null;
     gross_profit: Numeric | null;
     gross_profit_pct: Numeric | null;
     pour_cost_pct: Numeric | null;
     cogs_source: CogsSource | null;
     revenue_source: RevenueSource | null;
     category_totals: CategoryTotals[] | null;
     approved_at: Date | null;
     approved_by: string | null;
}

export const STOCKTAKE_SELECT = `
      SELECT
        s.id,
        s.hotel_id,
        s.period_id,
        s.status,
        s.total_cogs,
        s.total_revenue,
        s.gross_profit,
        s.gross_profit_pct,
        s.pour_cost_pct,
        s.cogs_source,
        s.revenue_source,
        s.category_totals,
        s.approved_at,
        s.approved_by
      FROM stocktake s`;

function frozenTotals(row: StocktakeRow): PeriodSummary | null {
     const cogs = toNumber(row.total_cogs);
     const revenue = toNumber(row.total_revenue);
     if (cogs === null || revenue === null || !row.cogs_source || !row.revenue_source) {
          return null;
     }
     return {
          cogs,
          revenue,
          grossProfit: num(row.gross_profit),
          grossProfitPct: toNumber(row.gross_profit_pct),
          pourCostPct: toNumber(row.pour_cost_pct),
          cogsSource: row.cogs_source,
          revenueSource: row.revenue_source,
          categories: row.category_totals ?? [],
     };
}

export function mapStocktake(row: StocktakeRow): Stocktake {
     return {
          id: toId(row.id),
          hotelId: toId(row.hotel_id),
          periodId: toId(row.period_id),
          status: row.status,
          totals: frozenTotals(row),
          approvedAt: optional(row.approved_at),
          approvedBy: optional(row.approved_by),
     };
}

export interface PeriodAuditRow {
     id: Numeric;
     period_id: Numeric;
     action: PeriodAuditAction;
     actor: string;
     occurred_at: Date;
}

export function mapPeriodAuditEntry(row: PeriodAuditRow): PeriodAuditEntry {
     return {
          id: toId(row.id),
          periodId: toId(row.period_id),
          action: row.action,
          actor: row.actor,
          occurredAt: row.occurred_at,
     };
}
