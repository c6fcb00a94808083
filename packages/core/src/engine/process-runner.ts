// packages/core/src/engine/process-runner.ts -- child process invocation for block binaries

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { STDERR_MAX_CHARS } from '../utils/constants.js';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** Data fed to the child's stdin: literal text or a stream piped through. */
export type ProcessInput = string | Readable;

/** Seam between the block executor and the OS; swapped out in tests. */
export interface ProcessRunner {
  run(binary: string, args: string[], stdin: ProcessInput): Promise<ProcessResult>;
}

/**
 * Spawn `binary`, feed `stdin`, and capture both output streams.
 *
 * Resolves once the child has exited and its streams are closed, whatever
 * the exit status. Rejects only when the process could not be started or
 * the stdin source failed; in the latter case the child is killed first.
 */
export function runProcess(binary: string, args: string[], stdin: ProcessInput): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const stdoutChunks: Buffer[] = [];
    let stderr = '';
    let settled = false;

    const fail = (err: Error) => {
      if (settled) return;
      settled = true;
      reject(err);
    };

    child.stdout.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });
    // Decoded as a stream so characters split across chunks survive.
    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (data: string) => {
      if (stderr.length < STDERR_MAX_CHARS) stderr += data;
    });

    // A child that exits without draining stdin surfaces EPIPE here; the
    // exit status reported on 'close' is what decides the outcome.
    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code !== 'EPIPE') fail(err);
    });

    child.on('error', fail);

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: stderr.slice(0, STDERR_MAX_CHARS),
        exitCode: code,
        signal,
      });
    });

    if (typeof stdin === 'string') {
      child.stdin.end(stdin);
    } else {
      stdin.once('error', (err) => {
        child.kill('SIGTERM');
        fail(err);
      });
      stdin.pipe(child.stdin);
    }
  });
}

export const nodeProcessRunner: ProcessRunner = {
  run: runProcess,
};
