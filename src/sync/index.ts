export * from "./syncEngine";
export * from "./runSync";
