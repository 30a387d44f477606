// Errors
export * from "./errors";

// Observability
export * as observability from "./observability/index";
