export { HomeAssistantClient, describeHttpError } from './HomeAssistantClient.js';
export type { HomeAssistantClientOptions } from './HomeAssistantClient.js';
export { ConfigValidator } from './ConfigValidator.js';
export type { ConfigCheckResult, HostOperations } from './types.js';
