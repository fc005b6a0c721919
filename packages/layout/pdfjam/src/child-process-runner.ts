import { spawn } from 'node:child_process';
import type { CommandResult, CommandRunnerPort } from '@trimfit/core';
import { ExternalToolError } from '@trimfit/core';

/** Runs a command to completion with no timeout, capturing stdout and stderr. */
export class ChildProcessRunner implements CommandRunnerPort {
  run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const decode = (chunks: Buffer[]): string => Buffer.concat(chunks).toString('utf8');

      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        reject(
          new ExternalToolError({
            command,
            args,
            exitCode: null,
            stdout: decode(stdout),
            stderr: decode(stderr),
            cause: error,
          }),
        );
      });

      child.on('close', (code, signal) => {
        resolve({
          exitCode: code ?? -1,
          signal: signal ?? undefined,
          stdout: decode(stdout),
          stderr: decode(stderr),
        });
      });
    });
  }
}
