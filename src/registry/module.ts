export * from "./interface";
export { AgentRegistry, requireAgent, requireActiveAgent } from "./src";
export { defaultConfiguration } from "./defaults";
