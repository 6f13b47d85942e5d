export * from "./local-date";
