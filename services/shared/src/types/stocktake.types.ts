// Type definitions for domain models

export type ItemCategory =
     | 'SPIRITS'
     | 'WINE'
     | 'DRAFT'
     | 'BOTTLED'
     | 'JUICE'
     | 'SYRUP'
     | 'SOFT_DRINK'
     | 'MINERAL';

export const ITEM_CATEGORIES: readonly ItemCategory[] = [
     'SPIRITS',
     'WINE',
     'DRAFT',
     'BOTTLED',
     'JUICE',
     'SYRUP',
     'SOFT_DRINK',
     'MINERAL',
];

export interface StockItem {
     id: number;
     hotelId: number;
     sku: string;
     name: string;
     category: ItemCategory;
     subcategory?: string;
     /** Container size in the category's base sub-unit (shots, pints, ml; 1 for wine). */
     uom: number;
     unitsPerCase?: number;
     servingSizeMl?: number;
     /** Cost per physical container (bottle, keg, case). */
     unitCost: number;
     menuPrice?: number;
     active: boolean;
}

export interface RawCount {
     fullUnits: number;
     partialUnits: number;
}

export type EntryMode = 'CASES_AND_BOTTLES' | 'TOTAL_BOTTLES';

export interface CountInput extends RawCount {
     entryMode?: EntryMode;
}

/** Natural-unit decomposition of a serving count, for display. */
export interface UnitBreakdown {
     full: number;
     partial: number;
     fullLabel: string;
     partialLabel: string;
     /** Loose bottles and ml remainder, juices only. */
     bottles?: number;
     ml?: number;
}

export interface MovementQuantities {
     purchasesQty: number;
     salesQty: number;
     wasteQty: number;
     transfersInQty: number;
     transfersOutQty: number;
     adjustmentsQty: number;
}

export interface LineOverrides {
     manualPurchasesValue: number | null;
     manualWasteValue: number | null;
     manualSalesValue: number | null;
}

export interface LineInputs extends MovementQuantities, LineOverrides {
     opening: RawCount;
     counted: RawCount | null;
}

export interface LineDerived {
     openingQty: number;
     countedQty: number | null;
     expectedQty: number;
     varianceQty: number | null;
     openingValue: number;
     countedValue: number | null;
     expectedValue: number;
     varianceValue: number | null;
}

export interface StocktakeLine extends LineInputs, LineDerived {
     id: number;
     stocktakeId: number;
     item: StockItem;
}

export type StocktakeStatus = 'DRAFT' | 'APPROVED';

export interface StockPeriod {
     id: number;
     hotelId: number;
     name: string;
     startDate: string;
     endDate: string;
     isClosed: boolean;
     manualPurchasesAmount: number | null;
     manualSalesAmount: number | null;
     closedAt?: Date;
     closedBy?: string;
     reopenedAt?: Date;
     reopenedBy?: string;
}

export interface Stocktake {
     id: number;
     hotelId: number;
     periodId: number;
     status: StocktakeStatus;
     totals: PeriodSummary | null;
     approvedAt?: Date;
     approvedBy?: string;
}

export type PeriodAuditAction = 'CLOSED' | 'REOPENED';

export interface PeriodAuditEntry {
     id: number;
     periodId: number;
     action: PeriodAuditAction;
     actor: string;
     occurredAt: Date;
}

// Aggregation

export type CogsSource = 'PERIOD_MANUAL_PURCHASES' | 'LINE_MANUAL_PURCHASES_WASTE' | 'LEDGER';
export type RevenueSource = 'LINE_MANUAL_SALES' | 'PERIOD_MANUAL_SALES' | 'LEDGER';

export interface LedgerTotals {
     purchasesValue: number;
     wasteValue: number;
     salesValue: number;
}

export interface CategoryTotals {
     category: ItemCategory;
     lineCount: number;
     openingValue: number;
     countedValue: number;
     expectedValue: number;
     varianceValue: number;
}

export interface PeriodSummary {
     cogs: number;
     revenue: number;
     grossProfit: number;
     /** null when revenue resolves to zero */
     grossProfitPct: number | null;
     pourCostPct: number | null;
     cogsSource: CogsSource;
     revenueSource: RevenueSource;
     categories: CategoryTotals[];
}

export type OverrideScope = 'line' | 'period';
export type OverrideKind = 'purchases' | 'waste' | 'sales';

export interface SetOverrideRequest {
     scope: OverrideScope;
     targetId: number;
     kind: OverrideKind;
     /** null clears the override */
     amount: number | null;
}

// Voice boundary

export interface VoiceCommand {
     action: string;
     itemIdentifier: string;
     fullUnits: number | null;
     partialUnits: number | null;
}

export interface MatchCandidate {
     itemId: number;
     name: string;
     score: number;
}

// Domain events

export type StocktakeEventType =
     | 'StockCounted'
     | 'LineOverrideSet'
     | 'PeriodOverrideSet'
     | 'StocktakePopulated'
     | 'PeriodClosed'
     | 'PeriodReopened';

export interface DomainEvent {
     id: number;
     type: StocktakeEventType;
     payload: Record<string, unknown>;
     status: 'PENDING' | 'SENT' | 'FAILED';
     createdAt: Date;
}
