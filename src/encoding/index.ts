export * from "./bom";
export * from "./determineEncoding";
export * from "./metaPrescan";
export * from "./registry";
