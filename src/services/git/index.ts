export { RepositorySync, commitMessage, type Publisher, type PublishResult, type PublishStep } from './repository.js';
export { runCommand, createGitRunner, type CommandRunner, type CommandOutput } from './command.js';
