const OBSERVED_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Observed dates are calendar days (`YYYY-MM-DD`), so plain string comparison orders them.
 */
export function isObservedDate(value: string): boolean {
  const match = OBSERVED_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function toObservedDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function assertObservedDate(value: string): void {
  if (!isObservedDate(value)) {
    throw new RangeError(`Invalid observed date "${value}", expected YYYY-MM-DD`);
  }
}
