export * from "./sql-date";
export * from "./db.service";
