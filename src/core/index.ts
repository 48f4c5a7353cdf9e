export * from "./interfaces";
export * from "./limiter";
export * from "./logger";
export * from "./node";
