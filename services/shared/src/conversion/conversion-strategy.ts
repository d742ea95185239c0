import { CountInput, RawCount, StockItem, UnitBreakdown } from '../types/stocktake.types';
import { InvalidItemConfigurationError } from '../utils/errors';

export type StrategyKey = 'spirits' | 'wine' | 'draft' | 'dozen' | 'syrup' | 'juice';

/**
 * How one family of items is counted, converted to servings and costed.
 *
 * `toServings(1, 0)` always equals `servingsPerContainer`, so a serving count can
 * be turned back into container-equivalents for valuation.
 */
export interface ConversionStrategy {
     readonly key: StrategyKey;
     readonly fullLabel: string;
     readonly partialLabel: string;
     /** FRACTION partials are a share of one container, ABSOLUTE ones a sub-unit count. */
     readonly partialKind: 'FRACTION' | 'ABSOLUTE';

     validateItem(item: StockItem): void;
     /** Exclusive upper bound for the partial component. */
     partialLimit(item: StockItem): number;
     toServings(count: RawCount, item: StockItem): number;
     fromServings(servings: number, item: StockItem): UnitBreakdown;
     toContainers(count: RawCount, item: StockItem): number;
     servingsPerContainer(item: StockItem): number;
     /** Turns an alternate entry mode into the strategy's own full/partial form. */
     normalize?(input: CountInput, item: StockItem): RawCount;
}

export function requirePositive(
     item: StockItem,
     value: number | undefined,
     field: string
): number {
     if (value === undefined || !Number.isFinite(value) || value <= 0) {
          throw new InvalidItemConfigurationError(item.sku, `${field} must be a positive number`);
     }
     return value;
}
