/**
 * Rounds a number (or every number inside an array or plain object) so that
 * durations and metrics stay readable in log lines.
 */
export function roundFloatsForLogging<T>(value: T, decimalPlaces?: number): T;
export function roundFloatsForLogging(value: unknown, decimalPlaces: number = 2): unknown {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || Number.isInteger(value)) {
      return value;
    }
    const factor = 10 ** decimalPlaces;
    return Math.round(value * factor) / factor;
  }
  if (Array.isArray(value)) {
    return value.map((item) => roundFloatsForLogging(item, decimalPlaces));
  }
  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, roundFloatsForLogging(item, decimalPlaces)])
    );
  }
  return value;
}
