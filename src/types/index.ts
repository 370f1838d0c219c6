// Type exports

export * from "./events";
export * from "./session";
export * from "./config";
