import { PoolClient } from 'pg';
import { MovementLedger, emptyMovements, movementLedger } from '../clients/movement-ledger';
import {
     UnitConversionRegistry,
     unitConversionRegistry,
} from '../conversion/unit-conversion-registry';
import {
     ITEM_COLUMNS,
     LINE_SELECT,
     LINE_VALUE_COLUMNS,
     PERIOD_SELECT,
     StockItemRow,
     StockPeriodRow,
     StocktakeLineRow,
     lineColumnValues,
     mapStockItem,
     mapStockPeriod,
     mapStocktakeLine,
     toId,
} from '../db/rows';
import { recordDomainEvent } from '../events/outbox';
import {
     CountInput,
     LineInputs,
     LineOverrides,
     OverrideKind,
     RawCount,
     SetOverrideRequest,
     StockPeriod,
     StocktakeLine,
     UnitBreakdown,
} from '../types/stocktake.types';
import {
     InvalidOverrideError,
     InvalidPeriodError,
     InvalidQuantityError,
     LineLockedError,
     LineNotFoundError,
     PeriodLockedError,
     PeriodNotFoundError,
     StocktakeAlreadyExistsError,
     StocktakeNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { toNumber } from '../utils/math';
import { valueLine } from '../valuation/line-valuation';

export interface CreatePeriodRequest {
     hotelId: number;
     name: string;
     startDate: string;
     endDate: string;
}

export interface PopulateResult {
     stocktakeId: number;
     periodId: number;
     lineCount: number;
}

export interface LineWriteResult {
     line: StocktakeLine;
     /** Servings of the pair that was written. */
     canonicalQty: number;
     value: number;
     displayBreakdown: UnitBreakdown;
}

export interface StocktakeLineView extends StocktakeLine {
     /** Counted quantity in natural units; null while uncounted. */
     displayBreakdown: UnitBreakdown | null;
}

export interface OverrideResult extends SetOverrideRequest {
     line?: StocktakeLine;
}

const LINE_OVERRIDE_FIELDS: Record<OverrideKind, keyof LineOverrides> = {
     purchases: 'manualPurchasesValue',
     waste: 'manualWasteValue',
     sales: 'manualSalesValue',
};

const PERIOD_OVERRIDE_COLUMNS: Partial<Record<OverrideKind, string>> = {
     purchases: 'manual_purchases_amount',
     sales: 'manual_sales_amount',
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
     if (!ISO_DATE.test(value)) {
          return false;
     }
     const parsed = new Date(`${value}T00:00:00Z`);
     return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function samePair(a: RawCount | null, b: RawCount): boolean {
     return a !== null && a.fullUnits === b.fullUnits && a.partialUnits === b.partialUnits;
}

export class StocktakeService {
     constructor(
          private readonly ledger: MovementLedger = movementLedger,
          private readonly registry: UnitConversionRegistry = unitConversionRegistry
     ) {}

     async createPeriod(client: PoolClient, request: CreatePeriodRequest): Promise<StockPeriod> {
          const { hotelId, startDate, endDate } = request;
          const name = request.name.trim();

          if (!name) {
               throw new InvalidPeriodError('Period name is required');
          }
          for (const date of [startDate, endDate]) {
               if (!isCalendarDate(date)) {
                    throw new InvalidPeriodError(`"${date}" is not a calendar date (YYYY-MM-DD)`);
               }
          }
          if (startDate > endDate) {
               throw new InvalidPeriodError(`Period starts ${startDate} after it ends ${endDate}`);
          }

          const { rows: hotels } = await client.query(`SELECT id FROM hotel WHERE id = $1`, [
               hotelId,
          ]);
          if (hotels.length === 0) {
               throw new InvalidPeriodError(`Hotel ${hotelId} does not exist`);
          }

          const { rows } = await client.query<StockPeriodRow>(
               `
      INSERT INTO stock_period (hotel_id, name, start_date, end_date)
      VALUES ($1, $2, $3::date, $4::date)
      RETURNING
        id, hotel_id, name,
        start_date::text AS start_date,
        end_date::text AS end_date,
        is_closed, manual_purchases_amount, manual_sales_amount,
        closed_at, closed_by, reopened_at, reopened_by
    `,
               [hotelId, name, startDate, endDate]
          );

          const period = mapStockPeriod(rows[0]);
          logger.info({ periodId: period.id, hotelId, startDate, endDate }, 'Period created');
          return period;
     }

     /**
      * Create the period's stocktake with one line per active item. Opening
      * counts carry forward from each item's latest earlier count.
      */
     async populateStocktake(client: PoolClient, periodId: number): Promise<PopulateResult> {
          const { rows: periods } = await client.query<StockPeriodRow>(
               `${PERIOD_SELECT} WHERE p.id = $1 FOR UPDATE`,
               [periodId]
          );
          if (periods.length === 0) {
               throw new PeriodNotFoundError(periodId);
          }
          const period = mapStockPeriod(periods[0]);
          if (period.isClosed) {
               throw new PeriodLockedError(periodId);
          }

          const { rows: existing } = await client.query<{ id: string | number }>(
               `SELECT id FROM stocktake WHERE period_id = $1`,
               [periodId]
          );
          if (existing.length > 0) {
               throw new StocktakeAlreadyExistsError(periodId, toId(existing[0].id));
          }

          const { rows: created } = await client.query<{ id: string | number }>(
               `
      INSERT INTO stocktake (hotel_id, period_id)
      VALUES ($1, $2)
      RETURNING id
    `,
               [period.hotelId, periodId]
          );
          const stocktakeId = toId(created[0].id);

          const { rows: itemRows } = await client.query<StockItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM stock_item i
      WHERE i.hotel_id = $1 AND i.active
      ORDER BY i.category, i.sku
    `,
               [period.hotelId]
          );

          const { rows: previous } = await client.query<{
               item_id: string | number;
               counted_full_units: string | number;
               counted_partial_units: string | number;
          }>(
               `
      SELECT DISTINCT ON (l.item_id)
        l.item_id, l.counted_full_units, l.counted_partial_units
      FROM stocktake_line l
      JOIN stocktake s ON s.id = l.stocktake_id
      JOIN stock_period p ON p.id = s.period_id
      WHERE s.hotel_id = $1
        AND p.end_date < $2::date
        AND l.counted_full_units IS NOT NULL
      ORDER BY l.item_id, p.end_date DESC
    `,
               [period.hotelId, period.startDate]
          );
          const openings = new Map<number, RawCount>(
               previous.map((row) => [
                    toId(row.item_id),
                    {
                         fullUnits: toNumber(row.counted_full_units) ?? 0,
                         partialUnits: toNumber(row.counted_partial_units) ?? 0,
                    },
               ])
          );

          const movements = await this.ledger.getItemMovements(client, {
               hotelId: period.hotelId,
               startDate: period.startDate,
               endDate: period.endDate,
          });

          const placeholders = LINE_VALUE_COLUMNS.map((_, i) => `$${i + 3}`).join(', ');
          for (const row of itemRows) {
               const item = mapStockItem(row);
               const inputs: LineInputs = {
                    ...(movements.get(item.id) ?? emptyMovements()),
                    opening: openings.get(item.id) ?? { fullUnits: 0, partialUnits: 0 },
                    counted: null,
                    manualPurchasesValue: null,
                    manualWasteValue: null,
                    manualSalesValue: null,
               };
               const derived = valueLine(item, inputs, this.registry);

               await client.query(
                    `
        INSERT INTO stocktake_line (stocktake_id, item_id, ${LINE_VALUE_COLUMNS.join(', ')})
        VALUES ($1, $2, ${placeholders})
      `,
                    [stocktakeId, item.id, ...lineColumnValues({ ...inputs, ...derived })]
               );
          }

          await recordDomainEvent(client, 'StocktakePopulated', {
               periodId,
               stocktakeId,
               lineCount: itemRows.length,
          });

          logger.info({ periodId, stocktakeId, lineCount: itemRows.length }, 'Stocktake populated');
          return { stocktakeId, periodId, lineCount: itemRows.length };
     }

     /** Record the closing count of a line and recompute its derived fields. */
     async recordCount(client: PoolClient, lineId: number, input: CountInput): Promise<LineWriteResult> {
          const line = await this.lockLine(client, lineId);
          const counted = this.registry.prepare(input, line.item);

          const updated = await this.persistLine(client, { ...line, counted });
          if (!samePair(line.counted, counted)) {
               await recordDomainEvent(client, 'StockCounted', {
                    lineId,
                    stocktakeId: line.stocktakeId,
                    itemId: line.item.id,
                    fullUnits: counted.fullUnits,
                    partialUnits: counted.partialUnits,
                    countedQty: updated.countedQty,
               });
          }

          logger.debug(
               { lineId, sku: line.item.sku, counted, countedQty: updated.countedQty },
               'Line counted'
          );

          const canonicalQty = updated.countedQty ?? 0;
          return {
               line: updated,
               canonicalQty,
               value: updated.countedValue ?? 0,
               displayBreakdown: this.registry.fromServings(canonicalQty, line.item),
          };
     }

     async recordOpeningCount(
          client: PoolClient,
          lineId: number,
          input: CountInput
     ): Promise<LineWriteResult> {
          const line = await this.lockLine(client, lineId);
          const opening = this.registry.prepare(input, line.item);

          const updated = await this.persistLine(client, { ...line, opening });
          logger.debug({ lineId, sku: line.item.sku, opening }, 'Opening count recorded');

          return {
               line: updated,
               canonicalQty: updated.openingQty,
               value: updated.openingValue,
               displayBreakdown: this.registry.fromServings(updated.openingQty, line.item),
          };
     }

     async setManualOverride(client: PoolClient, request: SetOverrideRequest): Promise<OverrideResult> {
          const { scope, targetId, kind, amount } = request;

          if (amount !== null && (!Number.isFinite(amount) || amount < 0)) {
               throw new InvalidQuantityError(
                    `Override amount must be a non-negative money value, got ${amount}`
               );
          }

          if (scope === 'line') {
               const line = await this.lockLine(client, targetId);
               const overrides: LineOverrides = {
                    manualPurchasesValue: line.manualPurchasesValue,
                    manualWasteValue: line.manualWasteValue,
                    manualSalesValue: line.manualSalesValue,
               };
               overrides[LINE_OVERRIDE_FIELDS[kind]] = amount;
               const updated = await this.persistLine(client, { ...line, ...overrides });
               await recordDomainEvent(client, 'LineOverrideSet', {
                    lineId: targetId,
                    stocktakeId: line.stocktakeId,
                    kind,
                    amount,
               });
               logger.info({ lineId: targetId, kind, amount }, 'Line override set');
               return { ...request, line: updated };
          }

          const column = PERIOD_OVERRIDE_COLUMNS[kind];
          if (!column) {
               throw new InvalidOverrideError(
                    `Period overrides accept purchases or sales, not ${kind}`
               );
          }

          const { rows } = await client.query<StockPeriodRow>(
               `${PERIOD_SELECT} WHERE p.id = $1 FOR UPDATE`,
               [targetId]
          );
          if (rows.length === 0) {
               throw new PeriodNotFoundError(targetId);
          }
          if (rows[0].is_closed) {
               throw new PeriodLockedError(targetId);
          }

          await client.query(
               `
      UPDATE stock_period
      SET ${column} = $2,
          updated_at = NOW()
      WHERE id = $1
    `,
               [targetId, amount]
          );
          await recordDomainEvent(client, 'PeriodOverrideSet', { periodId: targetId, kind, amount });

          logger.info({ periodId: targetId, kind, amount }, 'Period override set');
          return { ...request };
     }

     /** Re-read ledger quantities into every line of a draft stocktake. */
     async refreshMovements(client: PoolClient, stocktakeId: number): Promise<PopulateResult> {
          const { rows } = await client.query<{
               period_id: string | number;
               hotel_id: string | number;
               is_closed: boolean;
               start_date: string;
               end_date: string;
          }>(
               `
      SELECT
        p.id AS period_id,
        p.hotel_id,
        p.is_closed,
        p.start_date::text AS start_date,
        p.end_date::text AS end_date
      FROM stocktake s
      JOIN stock_period p ON p.id = s.period_id
      WHERE s.id = $1
      FOR SHARE OF p
    `,
               [stocktakeId]
          );
          if (rows.length === 0) {
               throw new StocktakeNotFoundError(`Stocktake ${stocktakeId} not found`);
          }
          const periodId = toId(rows[0].period_id);
          if (rows[0].is_closed) {
               throw new PeriodLockedError(periodId);
          }

          const { rows: lineRows } = await client.query<StocktakeLineRow>(
               `${LINE_SELECT} WHERE l.stocktake_id = $1 ORDER BY l.id FOR UPDATE OF l`,
               [stocktakeId]
          );
          const movements = await this.ledger.getItemMovements(client, {
               hotelId: toId(rows[0].hotel_id),
               startDate: rows[0].start_date,
               endDate: rows[0].end_date,
          });

          for (const row of lineRows) {
               const line = mapStocktakeLine(row);
               await this.persistLine(client, {
                    ...line,
                    ...(movements.get(line.item.id) ?? emptyMovements()),
               });
          }

          logger.info({ stocktakeId, lineCount: lineRows.length }, 'Ledger movements refreshed');
          return { stocktakeId, periodId, lineCount: lineRows.length };
     }

     async getLines(client: PoolClient, stocktakeId: number): Promise<StocktakeLine[]> {
          const { rows: stocktakes } = await client.query(`SELECT id FROM stocktake WHERE id = $1`, [
               stocktakeId,
          ]);
          if (stocktakes.length === 0) {
               throw new StocktakeNotFoundError(`Stocktake ${stocktakeId} not found`);
          }

          const { rows } = await client.query<StocktakeLineRow>(
               `${LINE_SELECT} WHERE l.stocktake_id = $1 ORDER BY i.category, i.sku`,
               [stocktakeId]
          );
          return rows.map(mapStocktakeLine);
     }

     describeLine(line: StocktakeLine): StocktakeLineView {
          return {
               ...line,
               displayBreakdown:
                    line.countedQty === null
                         ? null
                         : this.registry.fromServings(line.countedQty, line.item),
          };
     }

     /**
      * Lock order is period before line: the period row FOR SHARE (so a close
      * waits for this writer), then the line FOR UPDATE.
      */
     private async lockLine(client: PoolClient, lineId: number): Promise<StocktakeLine> {
          const { rows: periods } = await client.query<{
               period_id: string | number;
               is_closed: boolean;
          }>(
               `
      SELECT p.id AS period_id, p.is_closed
      FROM stocktake_line l
      JOIN stocktake s ON s.id = l.stocktake_id
      JOIN stock_period p ON p.id = s.period_id
      WHERE l.id = $1
      FOR SHARE OF p
    `,
               [lineId]
          );
          if (periods.length === 0) {
               throw new LineNotFoundError(lineId);
          }
          if (periods[0].is_closed) {
               throw new LineLockedError(lineId, toId(periods[0].period_id));
          }

          const { rows } = await client.query<StocktakeLineRow>(
               `${LINE_SELECT} WHERE l.id = $1 FOR UPDATE OF l`,
               [lineId]
          );
          if (rows.length === 0) {
               throw new LineNotFoundError(lineId);
          }
          return mapStocktakeLine(rows[0]);
     }

     /** Recompute derived fields from the raw inputs and write the whole line. */
     private async persistLine(client: PoolClient, line: StocktakeLine): Promise<StocktakeLine> {
          const updated: StocktakeLine = { ...line, ...valueLine(line.item, line, this.registry) };
          const assignments = LINE_VALUE_COLUMNS.map((column, i) => `${column} = $${i + 2}`).join(
               ',\n          '
          );

          await client.query(
               `
      UPDATE stocktake_line
      SET ${assignments},
          updated_at = NOW()
      WHERE id = $1
    `,
               [line.id, ...lineColumnValues(updated)]
          );
          return updated;
     }
}
