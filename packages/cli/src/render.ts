// packages/cli/src/render.ts -- Terminal rendering for engine events

import type { BlockMetadata, EngineEvent, InstallationStats, RunSummary } from '@blockflow/core';
import chalk from 'chalk';
import ora from 'ora';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format one event as a terminal line. Returns undefined for events that
 * are not shown.
 */
export function formatEvent(event: EngineEvent): string | undefined {
  switch (event.type) {
    case 'block.resolved':
      return chalk.gray(`  resolved ${event.block}@${event.version}`);

    case 'workflow.compiled':
      return chalk.cyan(
        `Compiled ${event.workflow}: ${event.vertices} blocks, ${event.edges} edges, roots: ${event.roots.join(', ') || '(none)'}`,
      );

    case 'run.started':
      return chalk.gray(`\n━━━ Run ${event.runId} (${event.workflow}, ${event.mode}) ━━━`);

    case 'level.started':
      return chalk.bold(`\nLevel ${event.level}: ${event.vertices.join(', ')}`);

    case 'block.started':
      return chalk.blue(`  ▶ ${event.block}${event.isRoot ? ' (root)' : ''}`);

    case 'block.completed': {
      const outputs = event.outputs.length > 0 ? ` -> ${event.outputs.join(', ')}` : '';
      return chalk.gray(`  ✓ ${event.block}${outputs} (${seconds(event.durationMs)})`);
    }

    case 'block.failed':
      return chalk.red(`  ✗ ${event.block}: ${event.error}`);

    case 'run.completed':
      return chalk.green(`\n━━━ Completed: ${event.executed} blocks in ${seconds(event.durationMs)} ━━━`);

    case 'run.failed':
      return chalk.red(`\n━━━ Run failed${event.block ? ` at ${event.block}` : ''} ━━━`);

    case 'install.skipped':
      return chalk.gray(`  ${event.block}@${event.version} already installed`);

    case 'install.completed':
      return chalk.green(`  installed ${event.block}@${event.version}`);

    case 'update.completed':
      return chalk.green(`  updated ${event.block} ${event.fromVersion} -> ${event.version}`);
  }
}

export function renderEvent(event: EngineEvent): void {
  const line = formatEvent(event);
  if (line !== undefined) console.log(line);
}

/** Spinner shown while a network-bound step runs. */
export async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  const spinner = ora({ text, isEnabled: process.stderr.isTTY === true }).start();
  try {
    const result = await task();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}

export function printRunSummary(summary: RunSummary, finalOutputs: string[], printResults: boolean): void {
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Run:       ${chalk.white(summary.runId)}`);
  console.log(`  Workflow:  ${chalk.white(summary.workflow)}`);
  console.log(`  Executed:  ${chalk.cyan(summary.executed.join(' -> '))}`);
  console.log(`  Duration:  ${chalk.cyan(seconds(summary.durationMs))}`);
  console.log(`  Outputs:   ${chalk.cyan(finalOutputs.join(', ') || '(none)')}`);
  console.log(chalk.gray('-'.repeat(40)));

  if (!printResults) return;
  for (const label of finalOutputs) {
    const value = summary.results[label];
    if (value === undefined) continue;
    console.log(chalk.bold(`\n[${label}]`));
    process.stdout.write(value.endsWith('\n') ? value : `${value}\n`);
  }
}

export function printBlockList(stats: InstallationStats): void {
  if (stats.blocks.length === 0) {
    console.log(chalk.gray(`No blocks installed in ${stats.homeDir}`));
    return;
  }
  for (const block of stats.blocks) {
    console.log(`${chalk.white(block.name.padEnd(24))} ${chalk.cyan(block.version.padEnd(12))} ${chalk.gray(block.sourceRepo)}`);
  }
  console.log(
    chalk.gray(`\n${stats.totalBlocks} block(s), ${formatBytes(stats.totalBinaryBytes)} in ${stats.homeDir}`),
  );
}

export function printBlockInfo(block: BlockMetadata): void {
  console.log(chalk.bold(block.name));
  console.log(`  Version:    ${block.version}`);
  console.log(`  Repository: ${block.sourceRepo}`);
  console.log(`  Binary:     ${block.binaryPath}`);
  console.log(`  Installed:  ${block.installedAt}`);
  console.log(`  Updated:    ${block.lastUpdated}`);

  const entries = Object.values(block.entries);
  if (entries.length === 0) return;
  console.log(chalk.bold('\n  Entries'));
  for (const entry of entries) {
    const inputs = entry.inputs.map((p) => `${p.name}:${p.type}`).join(', ');
    const outputs = entry.outputs.map((p) => `${p.name}:${p.type}`).join(', ');
    console.log(`    ${chalk.white(entry.name)}${entry.description ? chalk.gray(` — ${entry.description}`) : ''}`);
    console.log(chalk.gray(`      in: ${inputs || '-'}  out: ${outputs || '-'}`));
  }
}
