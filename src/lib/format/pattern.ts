import { PatternError } from "../common";

export enum FieldKind {
  Date,
  Time,
  Zone,
}

/** What part of a date a field contributes when parsed. */
export type DateComponent =
  | "era"
  | "year"
  | "weekYear"
  | "isoWeekYear"
  | "quarter"
  | "month"
  | "week"
  | "isoWeek"
  | "day"
  | "dayOfYear"
  | "weekday"
  | "date";

export interface PatternLetter {
  name: string;
  kind: FieldKind;
  component?: DateComponent;
}

export interface FieldToken extends PatternLetter {
  type: "field";
  letter: string;
  text: string;
  index: number;
}

export interface LiteralToken {
  type: "literal";
  text: string;
  index: number;
}

export type PatternToken = FieldToken | LiteralToken;

function date(name: string, component: DateComponent): PatternLetter {
  return { name, kind: FieldKind.Date, component };
}

function time(name: string): PatternLetter {
  return { name, kind: FieldKind.Time };
}

function zone(name: string): PatternLetter {
  return { name, kind: FieldKind.Zone };
}

// Letters understood by date-fns format and parse.
const PATTERN_LETTERS: Partial<Record<string, PatternLetter>> = {
  G: date("era", "era"),
  y: date("year", "year"),
  u: date("extended year", "year"),
  Y: date("week-numbering year", "weekYear"),
  R: date("ISO week-numbering year", "isoWeekYear"),
  Q: date("quarter", "quarter"),
  q: date("stand-alone quarter", "quarter"),
  M: date("month", "month"),
  L: date("stand-alone month", "month"),
  w: date("week of year", "week"),
  I: date("ISO week of year", "isoWeek"),
  d: date("day of month", "day"),
  D: date("day of year", "dayOfYear"),
  E: date("day of week", "weekday"),
  e: date("local day of week", "weekday"),
  c: date("stand-alone local day of week", "weekday"),
  i: date("ISO day of week", "weekday"),
  P: date("localized date", "date"),
  a: time("AM/PM"),
  b: time("AM/PM/noon/midnight"),
  B: time("flexible day period"),
  h: time("hour [1-12]"),
  H: time("hour [0-23]"),
  K: time("hour [0-11]"),
  k: time("hour [1-24]"),
  m: time("minute"),
  s: time("second"),
  S: time("fraction of second"),
  p: time("localized time"),
  X: zone("time zone offset (Z)"),
  x: zone("time zone offset"),
  O: zone("GMT offset"),
  z: zone("time zone name"),
  t: zone("seconds timestamp"),
  T: zone("milliseconds timestamp"),
};

// Letters that take an "o" suffix for ordinal numbers (do, Mo, ...).
const ORDINAL_LETTERS = "yYQqMLwIdDecihHKkms";

const LATIN_LETTER = /[a-zA-Z]/;

function pushLiteral(tokens: PatternToken[], text: string, index: number) {
  const last = tokens[tokens.length - 1];
  if (last?.type === "literal") {
    last.text += text;
  } else {
    tokens.push({ type: "literal", text, index });
  }
}

/** Splits a pattern into field and literal tokens.
 * - Throws PatternError on an unknown letter or an unterminated quote.
 */
export function compilePattern(pattern: string): PatternToken[] {
  const tokens: PatternToken[] = [];
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === "'") {
      if (pattern[i + 1] === "'") {
        pushLiteral(tokens, "'", i);
        i += 2;
        continue;
      }

      let text = "";
      let j = i + 1;
      let closed = false;
      while (j < pattern.length) {
        if (pattern[j] === "'") {
          if (pattern[j + 1] === "'") {
            text += "'";
            j += 2;
            continue;
          }
          closed = true;
          j++;
          break;
        }
        text += pattern[j];
        j++;
      }

      if (!closed) {
        throw new PatternError(
          `Unterminated quoted text at index ${i} in pattern '${pattern}'`,
          pattern,
          i
        );
      }
      pushLiteral(tokens, text, i);
      i = j;
      continue;
    }

    if (LATIN_LETTER.test(ch)) {
      const letter = PATTERN_LETTERS[ch];
      if (!letter) {
        throw new PatternError(
          `Unknown pattern letter '${ch}' at index ${i} in pattern '${pattern}'`,
          pattern,
          i
        );
      }

      let j = i + 1;
      if (ORDINAL_LETTERS.includes(ch) && pattern[j] === "o") {
        j++;
      } else {
        while (pattern[j] === ch) j++;
      }

      tokens.push({
        type: "field",
        letter: ch,
        text: pattern.slice(i, j),
        index: i,
        ...letter,
      });
      i = j;
      continue;
    }

    pushLiteral(tokens, ch, i);
    i++;
  }

  return tokens;
}

export function fieldTokens(tokens: readonly PatternToken[]): FieldToken[] {
  return tokens.filter((t): t is FieldToken => t.type === "field");
}

/** Whether the fields of a pattern are enough to pin down one calendar date. */
export function resolvesDate(tokens: readonly PatternToken[]): boolean {
  const has = new Set(fieldTokens(tokens).map((t) => t.component));

  if (has.has("date")) return true;
  if (has.has("year")) {
    return (has.has("month") && has.has("day")) || has.has("dayOfYear");
  }
  if (has.has("weekYear")) return has.has("week") && has.has("weekday");
  if (has.has("isoWeekYear")) return has.has("isoWeek") && has.has("weekday");
  return false;
}
