import type { Band } from './types';

export type DaylightErrorCode =
  | 'MISSING_EVENT'
  | 'INVALID_RANGE'
  | 'NESTING_ORDER'
  | 'INVALID_LOCATION';

export class DaylightError extends Error {
  readonly code: DaylightErrorCode;

  constructor(code: DaylightErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A boundary event the wheel needs was not produced for this date and place. */
export class MissingEventError extends DaylightError {
  readonly label: string;
  readonly band: Band;

  constructor(label: string, band: Band) {
    super('MISSING_EVENT', `Missing event "${label}" (${band.replace('_', ' ')})`);
    this.label = label;
    this.band = band;
  }
}

export class InvalidRangeError extends DaylightError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, expected: string) {
    super('INVALID_RANGE', `${field} must be ${expected}, got ${String(value)}`);
    this.field = field;
    this.value = value;
  }
}

/** Twilight boundaries that do not nest around daylight, so the arcs overlap. */
export class NestingOrderError extends DaylightError {
  readonly band: Band;
  readonly total: number;

  constructor(band: Band, total: number) {
    super(
      'NESTING_ORDER',
      `Boundaries of ${band.replace('_', ' ')} are not nested in depression order (arcs cover ${total.toFixed(6)} rad)`,
    );
    this.band = band;
    this.total = total;
  }
}

export class InvalidLocationError extends DaylightError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_LOCATION', `Invalid location: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
