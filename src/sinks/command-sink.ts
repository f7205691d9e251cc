/**
 * Pipes each rendered page body into a shell command and returns what it prints
 */
import { spawn } from 'node:child_process';
import { logger } from '../logger.js';
import type { Sink, VisitedResource } from '../crawl/types.js';

/**
 * Run `command` through the shell with `input` on stdin.
 * Resolves with stdout once the process exits; rejects if it cannot be started.
 * The page URL is exposed to the command as LINKPROBE_URL.
 */
export function runCommand(command: string, input: string, url: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      shell: true,
      stdio: ['pipe', 'pipe', 'inherit'],
      env: { ...process.env, LINKPROBE_URL: url },
    });

    const chunks: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code !== 0) logger.warn({ command, url, code }, 'Command exited with non-zero status');
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });

    // Commands that never read stdin close the pipe early.
    child.stdin.on('error', (error) => {
      logger.debug({ command, error: String(error) }, 'Command stdin closed');
    });
    child.stdin.end(input);
  });
}

export class CommandSink implements Sink {
  readonly name = 'execute';
  readonly kinds = ['page'] as const;

  constructor(private readonly command: string) {}

  handle({ target, body }: VisitedResource): Promise<string> {
    return runCommand(this.command, body, target.url);
  }
}
