export * from "./files";
export * from "./schema";
