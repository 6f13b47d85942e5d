import { DateConverter } from "./date-converter";
import { FormatError, ParseError, PatternError } from "./lib/common";
import { LocalDate } from "./lib/date";
import { DateFormatter } from "./lib/format";
import { SqlDate } from "./lib/db";

const sampleDates = [
  LocalDate.of(1, 1, 1),
  LocalDate.of(1999, 12, 31),
  LocalDate.of(2000, 2, 29),
  LocalDate.of(2018, 4, 5),
  LocalDate.of(9999, 12, 31),
];

describe("DateConverter scenarios", () => {
  it("reads and writes ISO text", () => {
    expect(DateConverter.fromString("2018-04-05").toString()).toBe("2018-04-05");
  });

  it("reads text with a pattern", () => {
    const date = DateConverter.fromPattern("2018/04/05", "yyyy/MM/dd").toLocalDate();
    expect(date.equals(LocalDate.of(2018, 4, 5))).toBe(true);
  });

  it("writes text with a pattern", () => {
    expect(
      DateConverter.fromString("2018-04-05").toFormattedString("yyyy年MM月dd日")
    ).toBe("2018年04月05日");
  });

  it("rejects a date that does not exist", () => {
    expect(() => DateConverter.fromString("2018-02-30")).toThrow(ParseError);
  });

  it("rejects a malformed pattern", () => {
    expect(() => DateConverter.fromPattern("05-04-2018", "notapattern!!")).toThrow(
      PatternError
    );
  });

  it("reads a database date", () => {
    const sqlDate = SqlDate.valueOf(LocalDate.of(2018, 6, 3));
    expect(DateConverter.fromSqlDate(sqlDate).toString()).toBe("2018-06-03");
  });
});

describe("DateConverter.from", () => {
  it("dispatches on its arguments", () => {
    const expected = DateConverter.fromLocalDate(LocalDate.of(2018, 4, 5));

    expect(DateConverter.from("2018-04-05").equals(expected)).toBe(true);
    expect(DateConverter.from("05.04.2018", "dd.MM.yyyy").equals(expected)).toBe(true);
    expect(
      DateConverter.from("2018/04/05", DateFormatter.ofPattern("yyyy/MM/dd")).equals(
        expected
      )
    ).toBe(true);
    expect(DateConverter.from(LocalDate.of(2018, 4, 5)).equals(expected)).toBe(true);
    expect(
      DateConverter.from(SqlDate.valueOf(LocalDate.of(2018, 4, 5))).equals(expected)
    ).toBe(true);
    expect(DateConverter.from(new Date(2018, 3, 5, 18, 30)).equals(expected)).toBe(true);
  });

  it("rejects an invalid JS Date", () => {
    expect(() => DateConverter.from(new Date("not a date"))).toThrow(RangeError);
  });
});

describe("DateConverter extraction", () => {
  const converter = DateConverter.fromString("2018-04-05");

  it("formats with a pattern or a formatter", () => {
    expect(converter.toString("dd/MM/yyyy")).toBe("05/04/2018");
    expect(converter.toString(DateFormatter.ofPattern("yyyy.MM.dd"))).toBe("2018.04.05");
    expect(converter.toFormattedString(DateFormatter.ISO_LOCAL_DATE)).toBe("2018-04-05");
  });

  it("refuses time fields", () => {
    expect(() => converter.toFormattedString("yyyy-MM-dd HH:mm")).toThrow(FormatError);
  });

  it("refuses a malformed output pattern", () => {
    expect(() => converter.toString("yyyy-MM-dd 'open")).toThrow(PatternError);
  });

  it("returns a database date", () => {
    expect(converter.toSqlDate().toString()).toBe("2018-04-05");
  });

  it("returns local midnight as a JS Date", () => {
    const date = converter.toDate();
    expect([date.getFullYear(), date.getMonth(), date.getDate()]).toEqual([2018, 3, 5]);
  });

  it("serializes to ISO text", () => {
    expect(JSON.stringify({ on: converter })).toBe('{"on":"2018-04-05"}');
  });
});

describe("DateConverter round trips", () => {
  const cases = sampleDates.map((d): [string, LocalDate] => [d.toString(), d]);

  it.each(cases)("%s", (_, date) => {
    expect(DateConverter.fromLocalDate(date).toLocalDate()).toBe(date);

    const iso = DateConverter.fromLocalDate(date).toString();
    expect(DateConverter.fromString(iso).toLocalDate().equals(date)).toBe(true);

    for (const pattern of ["dd/MM/yyyy", "yyyy年MM月dd日", "MMMM d, yyyy"]) {
      const text = DateConverter.fromLocalDate(date).toFormattedString(pattern);
      expect(DateConverter.fromPattern(text, pattern).toLocalDate().equals(date)).toBe(
        true
      );
    }

    const sqlDate = DateConverter.fromLocalDate(date).toSqlDate();
    expect(DateConverter.fromSqlDate(sqlDate).toLocalDate().equals(date)).toBe(true);

    expect(DateConverter.fromDate(date.toDate()).toLocalDate().equals(date)).toBe(true);
  });
});

describe("DateConverter results", () => {
  it("returns the converter on success", () => {
    const result = DateConverter.tryFromString("2018-04-05");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toString()).toBe("2018-04-05");
    }
  });

  it("returns each kind of error", () => {
    const parse = DateConverter.tryFromString("2018-02-30");
    const pattern = DateConverter.tryFromPattern("05-04-2018", "notapattern!!");
    const formatter = DateConverter.tryFromFormatter(
      "2018-04-05",
      DateFormatter.ofPattern("yyyy/MM/dd")
    );
    const format = DateConverter.fromString("2018-04-05").tryToFormattedString("HH:mm");

    expect(parse.ok ? undefined : parse.error.kind).toBe("parse");
    expect(pattern.ok ? undefined : pattern.error.kind).toBe("pattern");
    expect(formatter.ok ? undefined : formatter.error.kind).toBe("parse");
    expect(format.ok ? undefined : format.error.kind).toBe("format");
  });

  it("formats on success", () => {
    const result = DateConverter.fromString("2018-04-05").tryToFormattedString("yyyyMMdd");
    expect(result).toEqual({ ok: true, value: "20180405" });
  });
});
