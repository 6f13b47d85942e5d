import postgres from "postgres";
import { SqlDate } from "./sql-date";

export const DATE_OID = 1082;

/** DATE columns come back as SqlDate and SqlDate parameters go out as YYYY-MM-DD. */
export const sqlDateType = {
  to: DATE_OID,
  from: [DATE_OID],
  serialize: (value: SqlDate) => value.toString(),
  parse: (raw: string) => SqlDate.parse(raw),
};

export function createSql(connectionString?: string) {
  return postgres(connectionString || process.env.DATABASE_URL || "", {
    types: {
      date: sqlDateType,
    },
  });
}

export class DB {
  public sql: ReturnType<typeof createSql>;

  constructor(connectionString?: string) {
    this.sql = createSql(connectionString);
  }

  async currentDate(): Promise<SqlDate> {
    const [row] = await this.sql<{ today: SqlDate }[]>`
      SELECT CURRENT_DATE AS today
    `;

    if (!row) {
      throw new Error("SELECT CURRENT_DATE returned no rows");
    }
    return row.today;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
