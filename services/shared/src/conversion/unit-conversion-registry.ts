import { CountInput, ItemCategory, RawCount, StockItem, UnitBreakdown } from '../types/stocktake.types';
import { FractionOutOfRangeError, InvalidQuantityError } from '../utils/errors';
import { MONEY_PLACES, roundQty, roundTo } from '../utils/math';
import { ConversionStrategy, StrategyKey } from './conversion-strategy';
import { DEFAULT_STRATEGIES } from './strategies';

export const DEFAULT_CATEGORY_STRATEGIES: Readonly<Record<ItemCategory, StrategyKey>> = {
     SPIRITS: 'spirits',
     WINE: 'wine',
     DRAFT: 'draft',
     BOTTLED: 'dozen',
     SOFT_DRINK: 'dozen',
     MINERAL: 'dozen',
     JUICE: 'juice',
     SYRUP: 'syrup',
};

// Subcategory tags that pick a different formula than their category's default.
export const DEFAULT_SUBCATEGORY_STRATEGIES: Readonly<Record<string, StrategyKey>> = {
     JUICES: 'juice',
     SYRUPS: 'syrup',
     CORDIALS: 'syrup',
     SOFT_DRINKS: 'dozen',
};

// Largest bottle fraction; fractions are entered in hundredths.
export const MAX_BOTTLE_FRACTION = 0.99;

export class UnitConversionRegistry {
     private readonly strategies = new Map<StrategyKey, ConversionStrategy>();

     constructor(
          strategies: readonly ConversionStrategy[] = DEFAULT_STRATEGIES,
          private readonly categoryStrategies: Readonly<
               Record<ItemCategory, StrategyKey>
          > = DEFAULT_CATEGORY_STRATEGIES,
          private readonly subcategoryStrategies: Readonly<
               Record<string, StrategyKey>
          > = DEFAULT_SUBCATEGORY_STRATEGIES
     ) {
          for (const strategy of strategies) {
               this.strategies.set(strategy.key, strategy);
          }
     }

     resolve(item: StockItem): ConversionStrategy {
          const tag = item.subcategory?.trim().toUpperCase();
          const key =
               (tag && this.subcategoryStrategies[tag]) || this.categoryStrategies[item.category];
          const strategy = this.strategies.get(key);
          if (!strategy) {
               throw new Error(`No conversion strategy registered for "${key}"`);
          }
          strategy.validateItem(item);
          return strategy;
     }

     /**
      * Normalize an entry into the item's own full/partial form and validate it.
      * Partials are cut to the stored precision so a reload recomputes the same
      * values. Nothing is written before this passes.
      */
     prepare(input: CountInput, item: StockItem): RawCount {
          assertQuantity(input.fullUnits, 'fullUnits');
          assertQuantity(input.partialUnits, 'partialUnits');

          const strategy = this.resolve(item);
          let count: RawCount;
          if (strategy.normalize) {
               count = strategy.normalize(input, item);
          } else if (input.entryMode === 'TOTAL_BOTTLES') {
               throw new InvalidQuantityError(
                    `TOTAL_BOTTLES entry is not supported for ${strategy.key} items`
               );
          } else {
               count = { fullUnits: input.fullUnits, partialUnits: input.partialUnits };
          }
          count = { fullUnits: count.fullUnits, partialUnits: roundQty(count.partialUnits) };

          this.validate(count, item, strategy);
          return count;
     }

     validate(count: RawCount, item: StockItem, strategy = this.resolve(item)): void {
          assertQuantity(count.fullUnits, 'fullUnits');
          assertQuantity(count.partialUnits, 'partialUnits');

          if (!Number.isInteger(count.fullUnits)) {
               throw new InvalidQuantityError(
                    `fullUnits must be a whole number of ${strategy.fullLabel}, got ${count.fullUnits}`
               );
          }

          const limit = strategy.partialLimit(item);
          if (strategy.partialKind === 'FRACTION') {
               if (count.partialUnits > MAX_BOTTLE_FRACTION) {
                    throw new FractionOutOfRangeError(
                         `Partial ${strategy.partialLabel} must be between 0 and ${MAX_BOTTLE_FRACTION}, got ${count.partialUnits}`,
                         count.partialUnits,
                         limit
                    );
               }
               if (roundTo(count.partialUnits, MONEY_PLACES) !== count.partialUnits) {
                    throw new FractionOutOfRangeError(
                         `Partial ${strategy.partialLabel} takes at most 2 decimals, got ${count.partialUnits}`,
                         count.partialUnits,
                         limit
                    );
               }
          } else if (count.partialUnits >= limit) {
               throw new FractionOutOfRangeError(
                    `Partial ${strategy.partialLabel} must be below ${limit}, got ${count.partialUnits}`,
                    count.partialUnits,
                    limit
               );
          }
     }

     toServings(count: RawCount, item: StockItem): number {
          const strategy = this.resolve(item);
          this.validate(count, item, strategy);
          return roundQty(strategy.toServings(count, item));
     }

     fromServings(servings: number, item: StockItem): UnitBreakdown {
          assertQuantity(servings, 'servings');
          return this.resolve(item).fromServings(servings, item);
     }

     toContainers(count: RawCount, item: StockItem): number {
          const strategy = this.resolve(item);
          this.validate(count, item, strategy);
          return roundQty(strategy.toContainers(count, item));
     }

     servingsPerContainer(item: StockItem): number {
          return this.resolve(item).servingsPerContainer(item);
     }
}

function assertQuantity(value: number, field: string): void {
     if (!Number.isFinite(value)) {
          throw new InvalidQuantityError(`${field} must be a number`);
     }
     if (value < 0) {
          throw new InvalidQuantityError(`${field} cannot be negative, got ${value}`);
     }
}

export const unitConversionRegistry = new UnitConversionRegistry();
