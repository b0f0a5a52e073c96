export * from "./interface";
export { ErrorAggregator } from "./src";
