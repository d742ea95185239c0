// Quantities are kept to 4 decimals, money and display remainders to 2.
export const QTY_PLACES = 4;
export const MONEY_PLACES = 2;

export function roundTo(value: number, places: number): number {
     const factor = 10 ** places;
     const rounded = Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
     // avoid -0 leaking into responses
     return rounded === 0 ? 0 : rounded;
}

export const roundQty = (value: number): number => roundTo(value, QTY_PLACES);
export const roundMoney = (value: number): number => roundTo(value, MONEY_PLACES);

/**
 * Split a non-negative value into its whole part and a 2-decimal fraction.
 * A fraction that rounds up to 1 is carried into the whole part.
 */
export function splitFraction(value: number): { whole: number; fraction: number } {
     const rounded = roundTo(value, MONEY_PLACES);
     const whole = Math.floor(rounded);
     return { whole, fraction: roundTo(rounded - whole, MONEY_PLACES) };
}

/** Integer division that tolerates floating noise just below a boundary. */
export function wholeTimes(value: number, divisor: number): number {
     return Math.floor(roundTo(value / divisor, 6));
}

export function sum(values: number[]): number {
     return values.reduce((total, value) => total + value, 0);
}

/** pg returns NUMERIC columns as strings */
export function toNumber(value: string | number | null | undefined): number | null {
     if (value === null || value === undefined) {
          return null;
     }
     const parsed = typeof value === 'number' ? value : parseFloat(value);
     return Number.isFinite(parsed) ? parsed : null;
}
