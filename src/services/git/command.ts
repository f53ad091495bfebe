import { spawn } from 'child_process';
import { GitCommandError } from '../../errors.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs one command in the repository. Rejects with GitCommandError.
 */
export type CommandRunner = (args: string[]) => Promise<CommandOutput>;

export interface SpawnOptions {
  cwd: string;
  timeoutMs?: number;
}

export function runCommand(command: string, args: string[], options: SpawnOptions): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new GitCommandError(command, args, { exitCode: code, signal, stderr: stderr || stdout }));
      }
    });

    proc.on('error', (error) => {
      reject(
        new GitCommandError(command, args, {
          exitCode: null,
          signal: null,
          stderr,
          reason: `failed to start: ${error.message}`,
        })
      );
    });
  });
}

export function createGitRunner(repositoryPath: string, timeoutMs?: number): CommandRunner {
  return (args) => runCommand('git', args, { cwd: repositoryPath, timeoutMs });
}
