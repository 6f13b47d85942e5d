export * from "./pattern";
export * from "./date-formatter";
