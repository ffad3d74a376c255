export * from "./atomParser";
export * from "./feedFetcher";
