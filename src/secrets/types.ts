/**
 * Core types for secret synchronisation.
 *
 * A SecretStore returns every key/value pair at its configured location;
 * the SecretsSynchronizer turns that into the generated secrets file.
 */

export interface SecretStore {
  readonly name: string;
  /** Authenticate and verify connectivity */
  initialize(): Promise<void>;
  fetchAll(): Promise<Record<string, string>>;
  /** Where the secrets came from, for the generated file header */
  describeSource(): string;
  shutdown(): Promise<void>;
}
