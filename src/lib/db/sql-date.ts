import { LocalDate } from "../date/local-date";
import { DateFormatter } from "../format/date-formatter";

/** Value of a PostgreSQL DATE column. */
export class SqlDate {
  private constructor(private readonly date: LocalDate) {}

  static valueOf(date: LocalDate): SqlDate {
    return new SqlDate(date);
  }

  /** Reads DATE text as sent with DateStyle ISO, e.g. "2018-06-03".
   * - "infinity", BC dates and years past 9999 throw ParseError.
   */
  static parse(raw: string): SqlDate {
    return new SqlDate(DateFormatter.ISO_LOCAL_DATE.parse(raw));
  }

  toLocalDate(): LocalDate {
    return this.date;
  }

  equals(other: SqlDate): boolean {
    return this.date.equals(other.date);
  }

  toString(): string {
    return this.date.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}
