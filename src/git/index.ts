export { GitClient, GitCommandError } from './GitClient.js';
export type { GitStatus, GitLogEntry, GitClientOptions } from './GitClient.js';
export { GitRepository, classifyGitFailure } from './GitRepository.js';
export type { GitRepositoryOptions } from './GitRepository.js';
