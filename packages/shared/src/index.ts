export * from "./featureFlags";
export * from "./typeGuards";
