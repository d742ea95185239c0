import { PoolClient } from 'pg';
import {
     LINE_SELECT,
     PERIOD_SELECT,
     PeriodAuditRow,
     STOCKTAKE_SELECT,
     StockPeriodRow,
     StocktakeLineRow,
     StocktakeRow,
     mapPeriodAuditEntry,
     mapStockPeriod,
     mapStocktake,
     mapStocktakeLine,
} from '../db/rows';
import { recordDomainEvent } from '../events/outbox';
import { PeriodAuditEntry, PeriodSummary, StockPeriod } from '../types/stocktake.types';
import {
     ConflictingTransitionError,
     InvalidPeriodError,
     IncompleteCountError,
     NotClosedError,
     PeriodLockedError,
     PeriodNotFoundError,
     StocktakeNotFoundError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { PeriodSummaryService } from './period-summary-service';

export interface ClosePeriodResult {
     periodId: number;
     stocktakeId: number;
     closedAt: Date;
     closedBy: string;
     summary: PeriodSummary;
}

export interface ReopenPeriodResult {
     periodId: number;
     reopenedAt: Date;
     reopenedBy: string;
}

export class PeriodLifecycleService {
     constructor(private readonly summaryService: PeriodSummaryService = new PeriodSummaryService()) {}

     /**
      * DRAFT -> CLOSED. Every line must be counted; the aggregate at this
      * instant is frozen into the stocktake, which becomes APPROVED.
      */
     async closePeriod(client: PoolClient, periodId: number, actor: string): Promise<ClosePeriodResult> {
          const log = createChildLogger({ periodId, actor, transition: 'close' });
          const closedBy = requireActor(actor);

          const period = await this.lockForTransition(client, periodId);
          if (period.isClosed) {
               throw new PeriodLockedError(periodId, `Period ${periodId} is already closed`);
          }

          const { rows: stocktakes } = await client.query<StocktakeRow>(
               `${STOCKTAKE_SELECT} WHERE s.period_id = $1 FOR UPDATE`,
               [periodId]
          );
          if (stocktakes.length === 0) {
               throw new StocktakeNotFoundError(`Period ${periodId} has no stocktake`);
          }
          const stocktake = mapStocktake(stocktakes[0]);

          const { rows: lineRows } = await client.query<StocktakeLineRow>(
               `${LINE_SELECT} WHERE l.stocktake_id = $1 ORDER BY i.category, i.sku`,
               [stocktake.id]
          );
          const lines = lineRows.map(mapStocktakeLine);

          const uncounted = lines.filter((line) => line.counted === null).map((line) => line.item.sku);
          if (uncounted.length > 0) {
               log.info({ uncounted: uncounted.length }, 'Close rejected, count incomplete');
               throw new IncompleteCountError(periodId, uncounted);
          }

          const summary = await this.summaryService.computeSummary(client, period, lines);

          await client.query(
               `
      UPDATE stocktake
      SET status = 'APPROVED',
          total_cogs = $2,
          total_revenue = $3,
          gross_profit = $4,
          gross_profit_pct = $5,
          pour_cost_pct = $6,
          cogs_source = $7,
          revenue_source = $8,
          category_totals = $9::jsonb,
          approved_at = NOW(),
          approved_by = $10,
          updated_at = NOW()
      WHERE id = $1
    `,
               [
                    stocktake.id,
                    summary.cogs,
                    summary.revenue,
                    summary.grossProfit,
                    summary.grossProfitPct,
                    summary.pourCostPct,
                    summary.cogsSource,
                    summary.revenueSource,
                    JSON.stringify(summary.categories),
                    closedBy,
               ]
          );

          const { rows } = await client.query<{ closed_at: Date }>(
               `
      UPDATE stock_period
      SET is_closed = TRUE,
          closed_at = NOW(),
          closed_by = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING closed_at
    `,
               [periodId, closedBy]
          );
          const closedAt = rows[0].closed_at;

          await this.appendAudit(client, periodId, 'CLOSED', closedBy, closedAt);
          await recordDomainEvent(client, 'PeriodClosed', {
               periodId,
               stocktakeId: stocktake.id,
               closedBy,
               cogs: summary.cogs,
               revenue: summary.revenue,
          });

          log.info({ cogs: summary.cogs, revenue: summary.revenue }, 'Period closed');
          return { periodId, stocktakeId: stocktake.id, closedAt, closedBy, summary };
     }

     /** CLOSED -> DRAFT. Counts stay; frozen totals are cleared. */
     async reopenPeriod(client: PoolClient, periodId: number, actor: string): Promise<ReopenPeriodResult> {
          const log = createChildLogger({ periodId, actor, transition: 'reopen' });
          const reopenedBy = requireActor(actor);

          const period = await this.lockForTransition(client, periodId);
          if (!period.isClosed) {
               throw new NotClosedError(periodId);
          }

          await client.query(
               `
      UPDATE stocktake
      SET status = 'DRAFT',
          total_cogs = NULL,
          total_revenue = NULL,
          gross_profit = NULL,
          gross_profit_pct = NULL,
          pour_cost_pct = NULL,
          cogs_source = NULL,
          revenue_source = NULL,
          category_totals = NULL,
          approved_at = NULL,
          approved_by = NULL,
          updated_at = NOW()
      WHERE period_id = $1
    `,
               [periodId]
          );

          const { rows } = await client.query<{ reopened_at: Date }>(
               `
      UPDATE stock_period
      SET is_closed = FALSE,
          reopened_at = NOW(),
          reopened_by = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING reopened_at
    `,
               [periodId, reopenedBy]
          );
          const reopenedAt = rows[0].reopened_at;

          await this.appendAudit(client, periodId, 'REOPENED', reopenedBy, reopenedAt);
          await recordDomainEvent(client, 'PeriodReopened', { periodId, reopenedBy });

          log.info('Period reopened');
          return { periodId, reopenedAt, reopenedBy };
     }

     async getPeriodHistory(client: PoolClient, periodId: number): Promise<PeriodAuditEntry[]> {
          const { rows: periods } = await client.query(`SELECT id FROM stock_period WHERE id = $1`, [
               periodId,
          ]);
          if (periods.length === 0) {
               throw new PeriodNotFoundError(periodId);
          }

          const { rows } = await client.query<PeriodAuditRow>(
               `
      SELECT id, period_id, action, actor, occurred_at
      FROM period_audit_log
      WHERE period_id = $1
      ORDER BY occurred_at, id
    `,
               [periodId]
          );
          return rows.map(mapPeriodAuditEntry);
     }

     /**
      * Non-blocking transition lock keyed on the bigint period id, then the
      * period row FOR UPDATE, which waits for in-flight line writers holding
      * it FOR SHARE. Single-key advisory locks in this database belong to
      * period transitions.
      */
     private async lockForTransition(client: PoolClient, periodId: number): Promise<StockPeriod> {
          const { rows: lock } = await client.query<{ acquired: boolean }>(
               `SELECT pg_try_advisory_xact_lock($1::bigint) AS acquired`,
               [periodId]
          );
          if (!lock[0]?.acquired) {
               throw new ConflictingTransitionError(periodId);
          }

          const { rows } = await client.query<StockPeriodRow>(
               `${PERIOD_SELECT} WHERE p.id = $1 FOR UPDATE`,
               [periodId]
          );
          if (rows.length === 0) {
               throw new PeriodNotFoundError(periodId);
          }
          return mapStockPeriod(rows[0]);
     }

     private async appendAudit(
          client: PoolClient,
          periodId: number,
          action: PeriodAuditEntry['action'],
          actor: string,
          occurredAt: Date
     ): Promise<void> {
          await client.query(
               `
      INSERT INTO period_audit_log (period_id, action, actor, occurred_at)
      VALUES ($1, $2, $3, $4)
    `,
               [periodId, action, actor, occurredAt]
          );
     }
}

function requireActor(actor: string): string {
     const trimmed = actor.trim();
     if (!trimmed) {
          throw new InvalidPeriodError('A transition needs the acting user');
     }
     return trimmed;
}
