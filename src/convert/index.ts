export * from "./converter";
export * from "./documents";
export * from "./errors";
export * from "./languageValidator";
export * from "./options";
export * from "./tableReconstructor";
export * from "./textReconstructor";
