// packages/core/src/engine/block-executor.ts

import { open } from 'node:fs/promises';
import type { BlockMetadata } from '../types/blocks.js';
import type { Connection } from '../types/workflow.js';
import { ExecutionError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { BlockVertex } from './graph.js';
import type { ProcessInput, ProcessResult, ProcessRunner } from './process-runner.js';
import { nodeProcessRunner } from './process-runner.js';
import type { ResultStore } from './result-store.js';

export interface ExecuteArgs {
  vertex: BlockVertex;
  metadata: BlockMetadata;
  /** Upstream blocks; empty for a root. */
  incomingFrom: string[];
  outgoingTo: string[];
}

export interface ExecuteResult {
  /** Labels written to the result store, in invocation order. */
  outputs: string[];
}

/**
 * Runs one block: invokes its binary once per connection the block
 * declares, feeding stdin from the connection's source file (root
 * connections) or from the result store (labelled inputs), and stores
 * stdout under the connection's output label.
 */
export class BlockExecutor {
  constructor(
    private store: ResultStore,
    private runner: ProcessRunner = nodeProcessRunner,
    private logger: Logger = silentLogger,
  ) {}

  async execute(args: ExecuteArgs): Promise<ExecuteResult> {
    const { vertex, metadata } = args;

    this.logger.debug(
      `executing ${vertex.name} (inputs from: ${args.incomingFrom.join(', ') || 'source'}; feeds: ${args.outgoingTo.join(', ') || 'none'})`,
    );

    const outputs: string[] = [];
    for (const connection of vertex.connections) {
      this.checkEntry(vertex.name, connection, metadata);

      const result =
        connection.input === ''
          ? await this.fromSource(vertex.name, metadata.binaryPath, connection)
          : await this.fromResult(vertex.name, metadata.binaryPath, connection);

      if (connection.output !== '') {
        this.store.set(connection.output, result.stdout);
        outputs.push(connection.output);
      }
    }

    return { outputs };
  }

  private checkEntry(blockName: string, connection: Connection, metadata: BlockMetadata): void {
    const declared = Object.keys(metadata.entries);
    if (declared.length > 0 && !declared.includes(connection.fromEntry)) {
      throw new ExecutionError(
        `block "${blockName}" has no entry "${connection.fromEntry}" (available: ${declared.join(', ')})`,
        blockName,
      );
    }
  }

  private async fromSource(blockName: string, binary: string, connection: Connection): Promise<ProcessResult> {
    if (connection.source === '') {
      throw new ExecutionError(
        `connection "${connection.output}" of block "${blockName}" has neither an input nor a source`,
        blockName,
      );
    }

    let handle;
    try {
      handle = await open(connection.source, 'r');
    } catch (err) {
      throw new ExecutionError(
        `failed to open source "${connection.source}" for block "${blockName}": ${errorMessage(err)}`,
        blockName,
        '',
        undefined,
        { cause: err },
      );
    }

    const stream = handle.createReadStream({ autoClose: false });
    try {
      return await this.invoke(blockName, binary, connection.fromEntry, stream);
    } finally {
      stream.destroy();
      await handle.close();
    }
  }

  private async fromResult(blockName: string, binary: string, connection: Connection): Promise<ProcessResult> {
    const input = this.store.get(connection.input);
    if (input === undefined) {
      throw new ExecutionError(
        `no result available for input "${connection.input}" of block "${blockName}"`,
        blockName,
      );
    }
    return this.invoke(blockName, binary, connection.fromEntry, input);
  }

  private async invoke(
    blockName: string,
    binary: string,
    entry: string,
    stdin: ProcessInput,
  ): Promise<ProcessResult> {
    let result: ProcessResult;
    try {
      result = await this.runner.run(binary, [entry], stdin);
    } catch (err) {
      throw new ExecutionError(
        `failed to start block "${blockName}": ${errorMessage(err)}`,
        blockName,
        '',
        undefined,
        { cause: err },
      );
    }

    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
      throw new ExecutionError(
        `block "${blockName}" entry "${entry}" exited with ${status}: ${result.stderr.trim()}`,
        blockName,
        result.stderr,
        result.exitCode,
      );
    }

    this.logger.debug(`${blockName} ${entry}: ${result.stdout.length} chars of output`);
    return result;
  }
}
