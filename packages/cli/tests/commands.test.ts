import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { compileCommand } from '../src/commands/compile.js';
import { infoCommand } from '../src/commands/info.js';
import { listCommand } from '../src/commands/list.js';
import { runCommand } from '../src/commands/run.js';
import { uninstallCommand } from '../src/commands/uninstall.js';
import { updateCommand } from '../src/commands/update.js';
import { testContextFactory } from './test-context.js';

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map((args) => args.join(' '));
}

function errors(): string[] {
  return vi.mocked(console.error).mock.calls.map((args) => args.join(' '));
}

describe('commands', () => {
  let dir: string;
  let home: string;
  let manifest: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'blockflow-cmd-'));
    home = join(dir, 'home');
    const source = join(dir, 'in.txt');
    writeFileSync(source, 'hello');
    manifest = join(dir, 'workflow.yaml');
    writeFileSync(
      manifest,
      [
        'workflow_name: shout',
        'blocks:',
        '  - name: upper',
        '    github: acme/upper',
        '  - name: louder',
        '    github: acme/louder',
        'connections:',
        '  - from_block: upper',
        '    from_entry: upcase',
        '    output: a',
        `    source: ${source}`,
        '  - from_block: louder',
        '    from_entry: upcase',
        '    input: a',
        '    output: b',
        '',
      ].join('\n'),
    );
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('renders progress and the summary', async () => {
      await runCommand(testContextFactory(home).factory, false, manifest, {});

      const lines = logged();
      expect(lines).toContain('  ▶ upper (root)');
      expect(lines).toContain('  ▶ louder');
      expect(lines).toContain('\nLevel 1: louder');
      expect(lines).toContain('  Workflow:  shout');
      expect(lines).toContain('  Executed:  upper -> louder');
      expect(lines).toContain('  Outputs:   b');
      expect(process.exitCode).toBeUndefined();
    });

    it('prints final outputs on request', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await runCommand(testContextFactory(home).factory, false, manifest, { printResults: true });

      expect(logged()).toContain('\n[b]');
      expect(write).toHaveBeenCalledWith('HELLO\n');
    });

    it('runs in dataflow mode when asked', async () => {
      await runCommand(testContextFactory(home).factory, false, manifest, { mode: 'dataflow', maxParallel: 2 });

      expect(logged().some((line) => line.includes('(shout, dataflow)'))).toBe(true);
      expect(logged().some((line) => line.startsWith('\nLevel'))).toBe(false);
    });

    it('reports a missing manifest and fails', async () => {
      await runCommand(testContextFactory(home).factory, false, join(dir, 'absent.yaml'), {});

      expect(errors()[0]?.startsWith('Error: read workflow file: ENOENT')).toBe(true);
      expect(process.exitCode).toBe(1);
    });
  });

  it('compile prints the graph', async () => {
    await compileCommand(testContextFactory(home).factory, false, manifest);

    const lines = logged();
    expect(lines).toContain('Compiled shout: 2 blocks, 1 edges, roots: upper');
    expect(lines).toContain('  upper (v1.0.0)');
    expect(lines).toContain('  upper -> louder [a]');
    expect(lines).toContain('\nRoots:         upper');
    expect(lines).toContain('Final outputs: b');
  });

  it('list reports an empty installation', async () => {
    await listCommand(testContextFactory(home).factory, false);
    expect(logged()).toEqual([`No blocks installed in ${home}`]);
  });

  it('info fails for a block that is not installed', async () => {
    await infoCommand(testContextFactory(home).factory, false, 'ghost');
    expect(errors()).toEqual(["Error: block 'ghost' is not installed"]);
    expect(process.exitCode).toBe(1);
  });

  it('uninstall fails for a block that is not installed', async () => {
    await uninstallCommand(testContextFactory(home).factory, false, 'ghost');
    expect(errors()).toEqual(["Error: block 'ghost' is not installed"]);
  });

  it('update fails for a block that is not installed', async () => {
    await updateCommand(testContextFactory(home).factory, false, 'ghost', {});
    expect(errors()).toEqual(["Error: block 'ghost' is not installed"]);
    expect(process.exitCode).toBe(1);
  });

  it('update reports a block already at the requested version', async () => {
    const binary = join(home, 'upper', 'bin', 'upper');
    mkdirSync(join(home, 'upper', 'bin'), { recursive: true });
    mkdirSync(join(home, 'upper', 'metadata'), { recursive: true });
    writeFileSync(binary, '#!/bin/sh\n');
    writeFileSync(
      join(home, 'upper', 'metadata', 'v1.0.0.json'),
      JSON.stringify({
        name: 'upper',
        version: 'v1.0.0',
        source_repo: 'acme/upper',
        binary_path: binary,
        installed_at: '2026-01-01T00:00:00.000Z',
        last_updated: '2026-01-01T00:00:00.000Z',
        is_active: true,
      }),
    );

    await updateCommand(testContextFactory(home).factory, false, 'upper', { version: '1.0.0' });

    expect(logged()).toEqual(['  upper@v1.0.0 already installed', 'upper is already at version v1.0.0']);
    expect(process.exitCode).toBeUndefined();
  });
});
