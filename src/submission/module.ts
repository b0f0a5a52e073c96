export * from "./interface";
export { SubmissionProcessor, MAX_RETRIES } from "./src";
export { HANDLERS, resolveDataType } from "./handlers";
