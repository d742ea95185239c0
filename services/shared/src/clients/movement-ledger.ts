import { PoolClient } from 'pg';
import { LedgerTotals, MovementQuantities } from '../types/stocktake.types';
import { toId } from '../db/rows';
import { roundMoney, roundQty, toNumber } from '../utils/math';
import { logger } from '../utils/logger';

export interface LedgerRange {
     hotelId: number;
     /** Inclusive calendar dates (YYYY-MM-DD) in the hotel's own timezone. */
     startDate: string;
     endDate: string;
}

/**
 * Read side of the purchasing/POS/transfer movement ledger. Quantities are
 * servings; values are money in the hotel's currency.
 */
export interface MovementLedger {
     getPeriodTotals(client: PoolClient, range: LedgerRange): Promise<LedgerTotals>;
     getItemMovements(
          client: PoolClient,
          range: LedgerRange
     ): Promise<Map<number, MovementQuantities>>;
}

export function emptyMovements(): MovementQuantities {
     return {
          purchasesQty: 0,
          salesQty: 0,
          wasteQty: 0,
          transfersInQty: 0,
          transfersOutQty: 0,
          adjustmentsQty: 0,
     };
}

// Movement day is taken in the hotel's timezone so a late-night sale lands in the right period.
const IN_RANGE = `
        m.hotel_id = $1
        AND (m.occurred_at AT TIME ZONE h.timezone)::date BETWEEN $2::date AND $3::date`;

export class SqlMovementLedger implements MovementLedger {
     async getPeriodTotals(client: PoolClient, range: LedgerRange): Promise<LedgerTotals> {
          const { rows } = await client.query<{
               purchases_value: string | number | null;
               waste_value: string | number | null;
               sales_value: string | number | null;
          }>(
               `
      SELECT
        COALESCE(SUM(m.value) FILTER (WHERE m.movement_type = 'PURCHASE'), 0) AS purchases_value,
        COALESCE(SUM(m.value) FILTER (WHERE m.movement_type = 'WASTE'), 0) AS waste_value,
        COALESCE(SUM(m.value) FILTER (WHERE m.movement_type = 'SALE'), 0) AS sales_value
      FROM stock_movement m
      JOIN hotel h ON h.id = m.hotel_id
      WHERE ${IN_RANGE}
    `,
               [range.hotelId, range.startDate, range.endDate]
          );

          const row = rows[0];
          return {
               purchasesValue: roundMoney(toNumber(row?.purchases_value) ?? 0),
               wasteValue: roundMoney(toNumber(row?.waste_value) ?? 0),
               salesValue: roundMoney(toNumber(row?.sales_value) ?? 0),
          };
     }

     async getItemMovements(
          client: PoolClient,
          range: LedgerRange
     ): Promise<Map<number, MovementQuantities>> {
          const { rows } = await client.query<{
               item_id: string | number;
               movement_type: string;
               quantity: string | number;
          }>(
               `
      SELECT m.item_id, m.movement_type, SUM(m.quantity) AS quantity
      FROM stock_movement m
      JOIN hotel h ON h.id = m.hotel_id
      WHERE ${IN_RANGE}
      GROUP BY m.item_id, m.movement_type
    `,
               [range.hotelId, range.startDate, range.endDate]
          );

          const byItem = new Map<number, MovementQuantities>();
          for (const row of rows) {
               const itemId = toId(row.item_id);
               const movements = byItem.get(itemId) ?? emptyMovements();
               const quantity = roundQty(toNumber(row.quantity) ?? 0);

               switch (row.movement_type) {
                    case 'PURCHASE':
                         movements.purchasesQty = quantity;
                         break;
                    case 'SALE':
                         movements.salesQty = quantity;
                         break;
                    case 'WASTE':
                         movements.wasteQty = quantity;
                         break;
                    case 'TRANSFER_IN':
                         movements.transfersInQty = quantity;
                         break;
                    case 'TRANSFER_OUT':
                         movements.transfersOutQty = quantity;
                         break;
                    case 'ADJUSTMENT':
                         movements.adjustmentsQty = quantity;
                         break;
                    default:
                         logger.warn({ itemId, type: row.movement_type }, 'Unknown movement type ignored');
                         continue;
               }
               byItem.set(itemId, movements);
          }

          return byItem;
     }
}

export const movementLedger = new SqlMovementLedger();
