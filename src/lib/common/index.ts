export * from "./user-error";
export * from "./errors";
export * from "./result";
