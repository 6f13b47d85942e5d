import { format, isValid, parse } from "date-fns";
import { FormatError, ParseError } from "../common";
import { LocalDate } from "../date/local-date";
import {
  FieldKind,
  PatternToken,
  compilePattern,
  fieldTokens,
  resolvesDate,
} from "./pattern";

const ISO_PATTERN = "yyyy-MM-dd";
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Only fills fields a pattern leaves out, and resolvesDate() requires the date ones.
// Its year also anchors two-digit years (yy) to 2000..2099.
const REFERENCE_DATE = new Date(2050, 0, 1);

// Y (week-numbering year) and D (day of year) are plain pattern letters here.
const DATE_FNS_OPTIONS = {
  useAdditionalWeekYearTokens: true,
  useAdditionalDayOfYearTokens: true,
};

/** A compiled date pattern that formats and parses LocalDate values. */
export class DateFormatter {
  /** ISO-8601 calendar date, yyyy-MM-dd. Parses strictly. */
  static readonly ISO_LOCAL_DATE = new DateFormatter(
    ISO_PATTERN,
    compilePattern(ISO_PATTERN),
    true
  );

  private constructor(
    readonly pattern: string,
    readonly tokens: readonly PatternToken[],
    private readonly iso: boolean = false
  ) {}

  /** Throws PatternError if the pattern is malformed. */
  static ofPattern(pattern: string): DateFormatter {
    return new DateFormatter(pattern, compilePattern(pattern));
  }

  format(date: LocalDate): string {
    if (this.iso) return date.toString();

    const unavailable = fieldTokens(this.tokens).find(
      (t) => t.kind !== FieldKind.Date
    );
    if (unavailable) {
      throw new FormatError(
        `Pattern '${this.pattern}' asks for ${unavailable.name} ('${unavailable.text}'), which a date-only value does not have`,
        this.pattern,
        unavailable.letter
      );
    }

    try {
      return format(date.toDate(), this.pattern, DATE_FNS_OPTIONS);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new FormatError(
          `Cannot format ${date} with pattern '${this.pattern}': ${err.message}`,
          this.pattern,
          "",
          { cause: err }
        );
      }
      throw err;
    }
  }

  parse(text: string): LocalDate {
    if (this.iso) return this.parseIso(text);

    const zoneField = fieldTokens(this.tokens).find(
      (t) => t.kind === FieldKind.Zone
    );
    if (zoneField) {
      throw new ParseError(
        `Pattern '${this.pattern}' holds ${zoneField.name} ('${zoneField.text}'), which cannot be read into a date-only value`,
        text,
        this.pattern
      );
    }
    if (!resolvesDate(this.tokens)) {
      throw new ParseError(
        `Pattern '${this.pattern}' does not hold enough fields to resolve a date from '${text}'`,
        text,
        this.pattern
      );
    }

    let parsed: Date;
    try {
      parsed = parse(text, this.pattern, REFERENCE_DATE, DATE_FNS_OPTIONS);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new ParseError(
          `Text '${text}' could not be parsed with pattern '${this.pattern}': ${err.message}`,
          text,
          this.pattern,
          { cause: err }
        );
      }
      throw err;
    }

    if (!isValid(parsed)) {
      throw new ParseError(
        `Text '${text}' could not be parsed with pattern '${this.pattern}'`,
        text,
        this.pattern
      );
    }

    // date-fns reads yyyy as 1-4 digits and MM/dd as 1-2; the text must be
    // exactly what the pattern would print for the parsed value.
    const expected = format(parsed, this.pattern, DATE_FNS_OPTIONS);
    if (expected.toLowerCase() !== text.toLowerCase()) {
      throw new ParseError(
        `Text '${text}' does not match pattern '${this.pattern}' (expected '${expected}')`,
        text,
        this.pattern
      );
    }
    return this.toLocalDate(text, () => LocalDate.fromDate(parsed));
  }

  toString(): string {
    return this.pattern;
  }

  private parseIso(text: string): LocalDate {
    const match = ISO_DATE.exec(text);
    if (!match) {
      throw new ParseError(
        `Text '${text}' is not an ISO-8601 date (${ISO_PATTERN})`,
        text,
        this.pattern
      );
    }
    const [, year, month, day] = match;
    return this.toLocalDate(text, () =>
      LocalDate.of(Number(year), Number(month), Number(day))
    );
  }

  private toLocalDate(text: string, build: () => LocalDate): LocalDate {
    try {
      return build();
    } catch (err) {
      if (err instanceof RangeError) {
        throw new ParseError(
          `Text '${text}' could not be parsed: ${err.message}`,
          text,
          this.pattern,
          { cause: err }
        );
      }
      throw err;
    }
  }
}
