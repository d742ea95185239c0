import { CountInput, RawCount, StockItem, UnitBreakdown } from '../types/stocktake.types';
import { InvalidItemConfigurationError, InvalidQuantityError } from '../utils/errors';
import { roundTo, splitFraction, wholeTimes } from '../utils/math';
import { ConversionStrategy, requirePositive } from './conversion-strategy';

function bottleBreakdown(bottles: number, fullLabel: string, partialLabel: string): UnitBreakdown {
     const { whole, fraction } = splitFraction(bottles);
     return { full: whole, partial: fraction, fullLabel, partialLabel };
}

function containerBreakdown(
     subUnits: number,
     perContainer: number,
     fullLabel: string,
     partialLabel: string
): UnitBreakdown {
     const full = wholeTimes(subUnits, perContainer);
     return {
          full,
          partial: roundTo(subUnits - full * perContainer, 2),
          fullLabel,
          partialLabel,
     };
}

export const spiritsStrategy: ConversionStrategy = {
     key: 'spirits',
     fullLabel: 'bottles',
     partialLabel: 'bottle fraction',
     partialKind: 'FRACTION',
     validateItem(item) {
          requirePositive(item, item.uom, 'uom (shots per bottle)');
     },
     partialLimit: () => 1,
     toServings: ({ fullUnits, partialUnits }, item) => (fullUnits + partialUnits) * item.uom,
     fromServings(servings, item) {
          return bottleBreakdown(servings / item.uom, this.fullLabel, this.partialLabel);
     },
     toContainers: ({ fullUnits, partialUnits }) => fullUnits + partialUnits,
     servingsPerContainer: (item) => item.uom,
};

// The bottle itself is the serving unit for wine.
export const wineStrategy: ConversionStrategy = {
     key: 'wine',
     fullLabel: 'bottles',
     partialLabel: 'bottle fraction',
     partialKind: 'FRACTION',
     validateItem(item) {
          if (item.uom !== 1) {
               throw new InvalidItemConfigurationError(item.sku, 'wine uom must be 1');
          }
     },
     partialLimit: () => 1,
     toServings: ({ fullUnits, partialUnits }) => fullUnits + partialUnits,
     fromServings(servings) {
          return bottleBreakdown(servings, this.fullLabel, this.partialLabel);
     },
     toContainers: ({ fullUnits, partialUnits }) => fullUnits + partialUnits,
     servingsPerContainer: () => 1,
};

export const draftStrategy: ConversionStrategy = {
     key: 'draft',
     fullLabel: 'kegs',
     partialLabel: 'pints',
     partialKind: 'ABSOLUTE',
     validateItem(item) {
          requirePositive(item, item.uom, 'uom (pints per keg)');
     },
     partialLimit: (item) => item.uom,
     toServings: ({ fullUnits, partialUnits }, item) => fullUnits * item.uom + partialUnits,
     fromServings(servings, item) {
          return containerBreakdown(servings, item.uom, this.fullLabel, this.partialLabel);
     },
     toContainers: ({ fullUnits, partialUnits }, item) => fullUnits + partialUnits / item.uom,
     servingsPerContainer: (item) => item.uom,
};

// Case-packed bottles (bottled beer, soft drinks, minerals); one bottle is one serving.
export const dozenStrategy: ConversionStrategy = {
     key: 'dozen',
     fullLabel: 'cases',
     partialLabel: 'bottles',
     partialKind: 'ABSOLUTE',
     validateItem(item) {
          requirePositive(item, item.unitsPerCase, 'unitsPerCase');
     },
     partialLimit: (item) => requirePositive(item, item.unitsPerCase, 'unitsPerCase'),
     toServings({ fullUnits, partialUnits }, item) {
          return fullUnits * requirePositive(item, item.unitsPerCase, 'unitsPerCase') + partialUnits;
     },
     fromServings(servings, item) {
          const perCase = requirePositive(item, item.unitsPerCase, 'unitsPerCase');
          return containerBreakdown(servings, perCase, this.fullLabel, this.partialLabel);
     },
     toContainers({ fullUnits, partialUnits }, item) {
          return fullUnits + partialUnits / requirePositive(item, item.unitsPerCase, 'unitsPerCase');
     },
     servingsPerContainer: (item) => requirePositive(item, item.unitsPerCase, 'unitsPerCase'),
};

/**
 * Syrups are counted in bottles but poured by the serving; `uom` is the bottle
 * size in ml.
 */
export const syrupStrategy: ConversionStrategy = {
     key: 'syrup',
     fullLabel: 'bottles',
     partialLabel: 'bottle fraction',
     partialKind: 'FRACTION',
     validateItem(item) {
          requirePositive(item, item.uom, 'uom (bottle size ml)');
          requirePositive(item, item.servingSizeMl, 'servingSizeMl');
     },
     partialLimit: () => 1,
     toServings({ fullUnits, partialUnits }, item) {
          const servingMl = requirePositive(item, item.servingSizeMl, 'servingSizeMl');
          return ((fullUnits + partialUnits) * item.uom) / servingMl;
     },
     fromServings(servings, item) {
          const servingMl = requirePositive(item, item.servingSizeMl, 'servingSizeMl');
          return bottleBreakdown((servings * servingMl) / item.uom, this.fullLabel, this.partialLabel);
     },
     toContainers: ({ fullUnits, partialUnits }) => fullUnits + partialUnits,
     servingsPerContainer(item) {
          return item.uom / requirePositive(item, item.servingSizeMl, 'servingSizeMl');
     },
};

function juiceDimensions(item: StockItem) {
     return {
          bottleMl: requirePositive(item, item.uom, 'uom (bottle size ml)'),
          perCase: requirePositive(item, item.unitsPerCase, 'unitsPerCase'),
          servingMl: requirePositive(item, item.servingSizeMl, 'servingSizeMl'),
     };
}

/**
 * Juices track cases, loose bottles and the ml left in an open bottle. The
 * partial is a bottle count whose fraction is the open bottle.
 */
export const juiceStrategy: ConversionStrategy = {
     key: 'juice',
     fullLabel: 'cases',
     partialLabel: 'bottles',
     partialKind: 'ABSOLUTE',
     validateItem(item) {
          juiceDimensions(item);
     },
     partialLimit: (item) => juiceDimensions(item).perCase,
     toServings({ fullUnits, partialUnits }, item) {
          const { bottleMl, perCase, servingMl } = juiceDimensions(item);
          const looseBottles = Math.floor(partialUnits);
          const remainderMl = (partialUnits - looseBottles) * bottleMl;
          const totalMl = (fullUnits * perCase + looseBottles) * bottleMl + remainderMl;
          return totalMl / servingMl;
     },
     fromServings(servings, item) {
          const { bottleMl, perCase, servingMl } = juiceDimensions(item);
          const totalMl = roundTo(servings * servingMl, 2);
          const cases = wholeTimes(totalMl, perCase * bottleMl);
          const afterCases = totalMl - cases * perCase * bottleMl;
          const bottles = wholeTimes(afterCases, bottleMl);
          const ml = roundTo(afterCases - bottles * bottleMl, 2);
          return {
               full: cases,
               partial: roundTo(bottles + ml / bottleMl, 4),
               fullLabel: this.fullLabel,
               partialLabel: this.partialLabel,
               bottles,
               ml,
          };
     },
     toContainers({ fullUnits, partialUnits }, item) {
          return fullUnits + partialUnits / juiceDimensions(item).perCase;
     },
     servingsPerContainer(item) {
          const { bottleMl, perCase, servingMl } = juiceDimensions(item);
          return (perCase * bottleMl) / servingMl;
     },
     normalize(input: CountInput, item: StockItem): RawCount {
          if (input.entryMode !== 'TOTAL_BOTTLES') {
               return { fullUnits: input.fullUnits, partialUnits: input.partialUnits };
          }
          if (input.fullUnits !== 0) {
               throw new InvalidQuantityError(
                    'TOTAL_BOTTLES entry takes the bottle count in partialUnits with fullUnits 0'
               );
          }
          const { perCase } = juiceDimensions(item);
          const cases = wholeTimes(input.partialUnits, perCase);
          return {
               fullUnits: cases,
               partialUnits: roundTo(input.partialUnits - cases * perCase, 4),
          };
     },
};

export const DEFAULT_STRATEGIES: readonly ConversionStrategy[] = [
     spiritsStrategy,
     wineStrategy,
     draftStrategy,
     dozenStrategy,
     syrupStrategy,
     juiceStrategy,
];
