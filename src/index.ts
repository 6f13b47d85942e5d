export { DateConverter } from "./date-converter";
export { LocalDate, MIN_YEAR, MAX_YEAR } from "./lib/date";
export { DateFormatter, compilePattern, FieldKind } from "./lib/format";
export type { PatternToken, FieldToken, LiteralToken } from "./lib/format";
export { SqlDate, sqlDateType, createSql, DB } from "./lib/db";
export {
  UserError,
  DateConversionError,
  ParseError,
  PatternError,
  FormatError,
  attempt,
} from "./lib/common";
export type { ConversionErrorKind, ConversionResult } from "./lib/common";
