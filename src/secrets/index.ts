export type { SecretStore } from './types.js';
export { SecretsSynchronizer, renderSecretsFile, includeDirective } from './SecretsSynchronizer.js';
export type { SecretsSynchronizerOptions } from './SecretsSynchronizer.js';
export { createSecretStore } from './createSecretStore.js';
export { EnvSecretStore } from './providers/EnvSecretStore.js';
export { InfisicalSecretStore } from './providers/InfisicalSecretStore.js';
export type { InfisicalConfig } from './providers/InfisicalSecretStore.js';
export { VaultSecretStore } from './providers/VaultSecretStore.js';
export type { VaultConfig } from './providers/VaultSecretStore.js';
