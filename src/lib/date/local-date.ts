export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function pad(value: number, length: number): string {
  return String(value).padStart(length, "0");
}

/** A calendar date (year, month, day) with no time or zone.
 * - Always valid: instances only come from the static constructors.
 */
export class LocalDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number
  ) {}

  static of(year: number, month: number, day: number): LocalDate {
    if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
      throw new RangeError(
        `Invalid year ${year}: expected ${MIN_YEAR}..${MAX_YEAR}`
      );
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new RangeError(`Invalid month ${month}: expected 1..12`);
    }
    const length = LocalDate.lengthOfMonth(year, month);
    if (!Number.isInteger(day) || day < 1 || day > length) {
      throw new RangeError(
        `Invalid day ${day} for ${pad(year, 4)}-${pad(month, 2)}: expected 1..${length}`
      );
    }
    return new LocalDate(year, month, day);
  }

  // fromDate reads the local (not UTC) fields, the same day the user sees.
  static fromDate(date: Date): LocalDate {
    if (Number.isNaN(date.getTime())) {
      throw new RangeError("Invalid Date");
    }
    return LocalDate.of(date.getFullYear(), date.getMonth() + 1, date.getDate());
  }

  static today(): LocalDate {
    return LocalDate.fromDate(new Date());
  }

  static isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  }

  static lengthOfMonth(year: number, month: number): number {
    if (month === 2 && LocalDate.isLeapYear(year)) return 29;
    return DAYS_IN_MONTH[month - 1];
  }

  /** Local midnight of this day. */
  toDate(): Date {
    // setFullYear keeps years 1..99 as written; the Date constructor maps them to 19xx.
    const date = new Date(2000, 0, 1);
    date.setFullYear(this.year, this.month - 1, this.day);
    return date;
  }

  equals(other: LocalDate): boolean {
    return this.compareTo(other) === 0;
  }

  compareTo(other: LocalDate): number {
    return (
      this.year - other.year || this.month - other.month || this.day - other.day
    );
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
