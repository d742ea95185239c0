import { UnitConversionRegistry, unitConversionRegistry } from '../conversion/unit-conversion-registry';
import { LineDerived, LineInputs, StockItem } from '../types/stocktake.types';
import { roundMoney, roundQty } from '../utils/math';

/**
 * Servings represented by a manual money override. Purchases and waste are
 * costed per container, sales per serving at menu price. Returns null when the
 * override is unset or cannot be converted, so the ledger quantity applies.
 */
function overrideToServings(
     amount: number | null,
     pricePerUnit: number | undefined,
     servingsPerUnit: number
): number | null {
     if (amount === null) {
          return null;
     }
     if (pricePerUnit === undefined || pricePerUnit <= 0) {
          return null;
     }
     return (amount / pricePerUnit) * servingsPerUnit;
}

export interface EffectiveMovements {
     purchasesQty: number;
     wasteQty: number;
     salesQty: number;
}

export function effectiveMovements(
     item: StockItem,
     inputs: LineInputs,
     registry: UnitConversionRegistry = unitConversionRegistry
): EffectiveMovements {
     const perContainer = registry.servingsPerContainer(item);
     const purchasesFromOverride =
          inputs.manualPurchasesValue === null
               ? null
               : (overrideToServings(inputs.manualPurchasesValue, item.unitCost, perContainer) ?? 0);
     const wasteFromOverride =
          inputs.manualWasteValue === null
               ? null
               : (overrideToServings(inputs.manualWasteValue, item.unitCost, perContainer) ?? 0);

     return {
          purchasesQty: purchasesFromOverride ?? inputs.purchasesQty,
          wasteQty: wasteFromOverride ?? inputs.wasteQty,
          salesQty: overrideToServings(inputs.manualSalesValue, item.menuPrice, 1) ?? inputs.salesQty,
     };
}

/**
 * Recompute every derived field of a stocktake line from its raw inputs.
 *
 * Quantities are canonical servings. Money is always container-equivalents ×
 * unit cost, so the serving size never moves a counted or opening value.
 */
export function valueLine(
     item: StockItem,
     inputs: LineInputs,
     registry: UnitConversionRegistry = unitConversionRegistry
): LineDerived {
     const perContainer = registry.servingsPerContainer(item);
     const toMoney = (servings: number) => roundMoney((servings / perContainer) * item.unitCost);

     const openingQty = registry.toServings(inputs.opening, item);
     const openingValue = roundMoney(registry.toContainers(inputs.opening, item) * item.unitCost);

     const { purchasesQty, wasteQty, salesQty } = effectiveMovements(item, inputs, registry);
     const expectedQty = roundQty(
          openingQty +
               purchasesQty +
               inputs.transfersInQty -
               salesQty -
               wasteQty -
               inputs.transfersOutQty +
               inputs.adjustmentsQty
     );
     const expectedValue = toMoney(expectedQty);

     if (inputs.counted === null) {
          return {
               openingQty,
               countedQty: null,
               expectedQty,
               varianceQty: null,
               openingValue,
               countedValue: null,
               expectedValue,
               varianceValue: null,
          };
     }

     const countedQty = registry.toServings(inputs.counted, item);
     const varianceQty = roundQty(countedQty - expectedQty);

     return {
          openingQty,
          countedQty,
          expectedQty,
          varianceQty,
          openingValue,
          countedValue: roundMoney(registry.toContainers(inputs.counted, item) * item.unitCost),
          expectedValue,
          varianceValue: toMoney(varianceQty),
     };
}
