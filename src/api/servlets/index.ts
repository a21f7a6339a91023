export { createDeploymentRouter, sendOperationError } from './DeploymentServlet.js';
export { createWebhookRouter, computeSignature, verifySignature, announcedCommit, SIGNATURE_HEADER } from './WebhookServlet.js';
export type { WebhookOptions, WebhookPayload } from './WebhookServlet.js';
export { createRepairRouter } from './RepairServlet.js';
export { createDriftRouter } from './DriftServlet.js';
export { createLoggingRouter } from './LoggingServlet.js';
