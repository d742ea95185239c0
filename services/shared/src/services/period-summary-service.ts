import { PoolClient } from 'pg';
import { MovementLedger, movementLedger } from '../clients/movement-ledger';
import {
     LINE_SELECT,
     PERIOD_SELECT,
     STOCKTAKE_SELECT,
     StockPeriodRow,
     StocktakeLineRow,
     StocktakeRow,
     mapStockPeriod,
     mapStocktake,
     mapStocktakeLine,
} from '../db/rows';
import { PeriodSummary, StockPeriod } from '../types/stocktake.types';
import { PeriodNotFoundError } from '../utils/errors';
import { AggregationLine, aggregatePeriod } from '../valuation/period-aggregator';

export interface PeriodSummaryView extends PeriodSummary {
     periodId: number;
     stocktakeId: number | null;
     /** true when the totals were frozen by close rather than recomputed */
     frozen: boolean;
}

export class PeriodSummaryService {
     constructor(private readonly ledger: MovementLedger = movementLedger) {}

     /**
      * Read-only and lock-free. A closed period answers with the totals frozen
      * at close; a draft period is recomputed from its lines and the ledger.
      */
     async getPeriodSummary(client: PoolClient, periodId: number): Promise<PeriodSummaryView> {
          const { rows: periods } = await client.query<StockPeriodRow>(
               `${PERIOD_SELECT} WHERE p.id = $1`,
               [periodId]
          );
          if (periods.length === 0) {
               throw new PeriodNotFoundError(periodId);
          }
          const period = mapStockPeriod(periods[0]);

          const { rows: stocktakes } = await client.query<StocktakeRow>(
               `${STOCKTAKE_SELECT} WHERE s.period_id = $1`,
               [periodId]
          );
          const stocktake = stocktakes.length > 0 ? mapStocktake(stocktakes[0]) : null;

          if (period.isClosed && stocktake?.totals) {
               return { ...stocktake.totals, periodId, stocktakeId: stocktake.id, frozen: true };
          }

          let lines: AggregationLine[] = [];
          if (stocktake) {
               const { rows } = await client.query<StocktakeLineRow>(
                    `${LINE_SELECT} WHERE l.stocktake_id = $1`,
                    [stocktake.id]
               );
               lines = rows.map(mapStocktakeLine);
          }

          const summary = await this.computeSummary(client, period, lines);
          return { ...summary, periodId, stocktakeId: stocktake?.id ?? null, frozen: false };
     }

     async computeSummary(
          client: PoolClient,
          period: StockPeriod,
          lines: AggregationLine[]
     ): Promise<PeriodSummary> {
          const ledger = await this.ledger.getPeriodTotals(client, {
               hotelId: period.hotelId,
               startDate: period.startDate,
               endDate: period.endDate,
          });
          return aggregatePeriod({ period, lines, ledger });
     }
}
