import { UserError } from "./user-error";

export type ConversionErrorKind = "parse" | "pattern" | "format";

/** Base class of every error a date conversion can raise. */
export abstract class DateConversionError extends UserError {
  abstract readonly kind: ConversionErrorKind;
}

/** Text could not be read as a calendar date with the active pattern. */
export class ParseError extends DateConversionError {
  readonly kind = "parse";

  constructor(
    message: string,
    readonly text: string,
    readonly pattern: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** A pattern string is not a valid formatting pattern. */
export class PatternError extends DateConversionError {
  readonly kind = "pattern";

  constructor(message: string, readonly pattern: string, readonly index: number) {
    super(message);
    this.name = "PatternError";
  }
}

/** A valid pattern asks for a field a date-only value does not have. */
export class FormatError extends DateConversionError {
  readonly kind = "format";

  constructor(
    message: string,
    readonly pattern: string,
    readonly letter: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FormatError";
  }
}
