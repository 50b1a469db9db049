export * from "./createReader";
export * from "./decode";
export * from "./files";
export * from "./lookahead";
export * from "./stripBom";
