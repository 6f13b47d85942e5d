import { ConversionResult, attempt } from "./lib/common";
import { LocalDate } from "./lib/date";
import { DateFormatter } from "./lib/format";
import { SqlDate } from "./lib/db/sql-date";

/** Converts one calendar date between text, LocalDate, SqlDate and JS Date.
 *
 * ```ts
 * DateConverter.from("2018-04-05").toLocalDate();
 * DateConverter.from("2018/04/05", "yyyy/MM/dd").toSqlDate();
 * DateConverter.from(sqlDate).toString("yyyy年MM月dd日");
 * ```
 */
export class DateConverter {
  private constructor(private readonly date: LocalDate) {}

  /** Reads ISO-8601 text (yyyy-MM-dd). Throws ParseError. */
  static from(text: string): DateConverter;
  /** Reads text with a pattern or compiled formatter. Throws PatternError or ParseError. */
  static from(text: string, format: string | DateFormatter): DateConverter;
  static from(date: LocalDate | SqlDate | Date): DateConverter;
  static from(
    value: string | LocalDate | SqlDate | Date,
    format?: string | DateFormatter
  ): DateConverter {
    if (typeof value === "string") {
      if (format === undefined) return DateConverter.fromString(value);
      if (typeof format === "string") {
        return DateConverter.fromPattern(value, format);
      }
      return DateConverter.fromFormatter(value, format);
    }
    if (value instanceof LocalDate) return DateConverter.fromLocalDate(value);
    if (value instanceof SqlDate) return DateConverter.fromSqlDate(value);
    return DateConverter.fromDate(value);
  }

  static fromString(text: string): DateConverter {
    return DateConverter.fromFormatter(text, DateFormatter.ISO_LOCAL_DATE);
  }

  static fromPattern(text: string, pattern: string): DateConverter {
    return DateConverter.fromFormatter(text, DateFormatter.ofPattern(pattern));
  }

  static fromFormatter(text: string, formatter: DateFormatter): DateConverter {
    return new DateConverter(formatter.parse(text));
  }

  static fromLocalDate(date: LocalDate): DateConverter {
    return new DateConverter(date);
  }

  static fromSqlDate(sqlDate: SqlDate): DateConverter {
    return new DateConverter(sqlDate.toLocalDate());
  }

  /** Takes the local day of a JS Date. Throws RangeError for an invalid Date. */
  static fromDate(date: Date): DateConverter {
    return new DateConverter(LocalDate.fromDate(date));
  }

  static tryFromString(text: string): ConversionResult<DateConverter> {
    return attempt(() => DateConverter.fromString(text));
  }

  static tryFromPattern(
    text: string,
    pattern: string
  ): ConversionResult<DateConverter> {
    return attempt(() => DateConverter.fromPattern(text, pattern));
  }

  static tryFromFormatter(
    text: string,
    formatter: DateFormatter
  ): ConversionResult<DateConverter> {
    return attempt(() => DateConverter.fromFormatter(text, formatter));
  }

  /** ISO-8601 text, or text in the given pattern or formatter. */
  toString(format?: string | DateFormatter): string {
    if (format === undefined) return this.date.toString();
    return this.toFormattedString(format);
  }

  /** Throws PatternError for a malformed pattern and FormatError for time fields. */
  toFormattedString(format: string | DateFormatter): string {
    const formatter =
      typeof format === "string" ? DateFormatter.ofPattern(format) : format;
    return formatter.format(this.date);
  }

  tryToFormattedString(format: string | DateFormatter): ConversionResult<string> {
    return attempt(() => this.toFormattedString(format));
  }

  toLocalDate(): LocalDate {
    return this.date;
  }

  toSqlDate(): SqlDate {
    return SqlDate.valueOf(this.date);
  }

  /** Local midnight of the held date. */
  toDate(): Date {
    return this.date.toDate();
  }

  equals(other: DateConverter): boolean {
    return this.date.equals(other.date);
  }

  toJSON(): string {
    return this.date.toString();
  }
}
