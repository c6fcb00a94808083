// packages/core/src/blocks/package-manager.ts

import { access, chmod, mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { EventBus } from '../engine/event-bus.js';
import type {
  BlockInstaller,
  BlockMetadata,
  InstallRequest,
  InstallationStats,
  Release,
  UpdateResult,
} from '../types/blocks.js';
import { PackageError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { blockEntrySchema, parseBlockManifest } from './block-manifest.js';
import type { GithubClient } from './github-client.js';
import { tagCandidates } from './github-client.js';
import { platformKey } from './platform.js';

export interface PackageManagerOptions {
  /** Root directory holding one sub-directory per installed block. */
  home: string;
  client: GithubClient;
  logger?: Logger;
  events?: EventBus;
  /** Overrides the `<os>-<arch>` key used to pick a release asset. */
  platform?: string;
}

const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

const metadataRecordSchema = z
  .object({
    name: z.string(),
    version: z.string(),
    source_repo: z.string(),
    binary_path: z.string(),
    installed_at: z.string(),
    last_updated: z.string(),
    is_active: z.boolean().default(true),
    entries: z.record(blockEntrySchema).nullish(),
  })
  .transform(
    (r): BlockMetadata => ({
      name: r.name,
      version: r.version,
      sourceRepo: r.source_repo,
      binaryPath: r.binary_path,
      installedAt: r.installed_at,
      lastUpdated: r.last_updated,
      isActive: r.is_active,
      entries: r.entries ?? {},
    }),
  );

function toRecord(metadata: BlockMetadata) {
  return {
    name: metadata.name,
    version: metadata.version,
    source_repo: metadata.sourceRepo,
    binary_path: metadata.binaryPath,
    installed_at: metadata.installedAt,
    last_updated: metadata.lastUpdated,
    is_active: metadata.isActive,
    entries: metadata.entries,
  };
}

function metadataFileName(version: string): string {
  return `${version.replace(/[\\/]/g, '_')}.json`;
}

function sameVersion(installed: string, requested: string): boolean {
  return tagCandidates(requested).includes(installed);
}

/**
 * Installs block binaries from GitHub releases into a local home
 * directory and keeps their metadata in memory.
 *
 * Layout: `<home>/<block>/bin/<asset>` and
 * `<home>/<block>/metadata/<version>.json`.
 */
export class PackageManager implements BlockInstaller {
  private blocks = new Map<string, BlockMetadata>();
  private logger: Logger;
  private platform: string;

  private constructor(private options: PackageManagerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.platform = options.platform ?? platformKey();
  }

  /**
   * Open the installation at `options.home`, creating it when absent.
   * Fails when a block's metadata points at a binary that no longer exists.
   */
  static async open(options: PackageManagerOptions): Promise<PackageManager> {
    const manager = new PackageManager(options);
    await manager.load();
    return manager;
  }

  get homeDir(): string {
    return this.options.home;
  }

  async install(request: InstallRequest): Promise<BlockMetadata> {
    const { repo, force = false } = request;
    const version = request.version ?? '';
    if (!REPO_PATTERN.test(repo)) {
      throw new PackageError(`invalid repository "${repo}": expected owner/repo`, repo);
    }

    const existing = this.list().find((b) => b.sourceRepo === repo);
    if (existing && !force && (version === '' || sameVersion(existing.version, version))) {
      return this.skip(existing);
    }

    const { client } = this.options;
    const release = version === '' ? await client.getLatestRelease(repo) : await client.getReleaseByTag(repo, version);
    const info = parseBlockManifest(await client.fetchBlockManifest(repo, release.tagName), repo);

    const current = this.blocks.get(info.name);
    if (current && !force && current.version === release.tagName) {
      return this.skip(current);
    }

    const binaryPath = await this.downloadBinary(repo, info.name, release, info.binary.assets);
    const now = new Date().toISOString();
    const metadata: BlockMetadata = {
      name: info.name,
      version: release.tagName,
      sourceRepo: repo,
      binaryPath,
      installedAt: current?.version === release.tagName ? current.installedAt : now,
      lastUpdated: now,
      isActive: true,
      entries: info.entries,
    };
    await this.storeMetadata(metadata);
    this.blocks.set(metadata.name, metadata);

    this.logger.debug(`installed ${metadata.name}@${metadata.version} from ${repo}`);
    this.options.events?.emitEvent({
      type: 'install.completed',
      block: metadata.name,
      version: metadata.version,
      binaryPath,
    });
    return metadata;
  }

  /**
   * Move an installed block to `version`, or to its repository's latest
   * release. The previous binary is removed unless the new one replaced it
   * in place; its metadata file stays behind, marked inactive.
   */
  async update(name: string, version = ''): Promise<UpdateResult> {
    const current = this.blocks.get(name);
    if (!current) {
      throw new PackageError(`block '${name}' is not installed`);
    }
    if (version !== '' && sameVersion(current.version, version)) {
      return { metadata: this.skip(current), previousVersion: current.version, updated: false };
    }

    const { client } = this.options;
    const repo = current.sourceRepo;
    const release = version === '' ? await client.getLatestRelease(repo) : await client.getReleaseByTag(repo, version);
    if (release.tagName === current.version) {
      return { metadata: this.skip(current), previousVersion: current.version, updated: false };
    }

    const info = parseBlockManifest(await client.fetchBlockManifest(repo, release.tagName), repo);
    if (info.name !== name) {
      throw new PackageError(`release ${release.tagName} provides block '${info.name}', not '${name}'`, repo);
    }

    const binaryPath = await this.downloadBinary(repo, name, release, info.binary.assets);
    if (binaryPath !== current.binaryPath) {
      await rm(current.binaryPath, { force: true });
    }
    const metadata: BlockMetadata = {
      ...current,
      version: release.tagName,
      binaryPath,
      lastUpdated: new Date().toISOString(),
      isActive: true,
      entries: info.entries,
    };
    await this.storeMetadata(metadata);
    this.blocks.set(name, metadata);

    this.logger.debug(`updated ${name} from ${current.version} to ${metadata.version}`);
    this.options.events?.emitEvent({
      type: 'update.completed',
      block: name,
      fromVersion: current.version,
      version: metadata.version,
      binaryPath,
    });
    return { metadata, previousVersion: current.version, updated: true };
  }

  async uninstall(name: string): Promise<void> {
    if (!this.blocks.has(name)) {
      throw new PackageError(`block '${name}' is not installed`);
    }
    await rm(join(this.options.home, name), { recursive: true, force: true });
    this.blocks.delete(name);
    this.logger.debug(`uninstalled ${name}`);
  }

  /** Installed blocks sorted by name. */
  list(): BlockMetadata[] {
    return [...this.blocks.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  getLoadedBlock(name: string): BlockMetadata | undefined {
    return this.blocks.get(name);
  }

  isInstalled(name: string): boolean {
    return this.blocks.has(name);
  }

  async getInstallationStats(): Promise<InstallationStats> {
    const blocks = this.list();
    let totalBinaryBytes = 0;
    for (const block of blocks) {
      const info = await stat(block.binaryPath).catch((err: unknown) => {
        this.logger.warn(`cannot stat ${block.binaryPath}: ${errorMessage(err)}`);
        return undefined;
      });
      totalBinaryBytes += info?.size ?? 0;
    }
    return { homeDir: this.options.home, totalBlocks: blocks.length, totalBinaryBytes, blocks };
  }

  private skip(metadata: BlockMetadata): BlockMetadata {
    this.logger.debug(`${metadata.name}@${metadata.version} already installed`);
    this.options.events?.emitEvent({ type: 'install.skipped', block: metadata.name, version: metadata.version });
    return metadata;
  }

  private async downloadBinary(
    repo: string,
    blockName: string,
    release: Release,
    assets: Record<string, string>,
  ): Promise<string> {
    const assetName = assets[this.platform];
    if (!assetName) {
      throw new PackageError(`no binary found for platform ${this.platform}`, repo);
    }
    const asset = release.assets.find((a) => a.name === assetName);
    if (!asset) {
      throw new PackageError(`asset '${assetName}' not found in release ${release.tagName}`, repo);
    }

    const data = await this.options.client.downloadAsset(repo, asset);

    const binDir = join(this.options.home, blockName, 'bin');
    await mkdir(binDir, { recursive: true });
    // Asset names come from the block's manifest; keep them inside bin/.
    const binaryPath = join(binDir, assetName.replace(/[\\/]/g, '_'));
    await writeFile(binaryPath, data);
    await chmod(binaryPath, 0o755);
    this.logger.debug(`wrote ${data.length} bytes to ${binaryPath}`);
    return binaryPath;
  }

  private async storeMetadata(metadata: BlockMetadata): Promise<void> {
    const dir = join(this.options.home, metadata.name, 'metadata');
    await mkdir(dir, { recursive: true });

    const target = metadataFileName(metadata.version);
    for (const file of await readdir(dir)) {
      if (file === target || !file.endsWith('.json')) continue;
      const previous = await this.readMetadata(join(dir, file));
      if (previous?.isActive) {
        await writeFile(join(dir, file), `${JSON.stringify(toRecord({ ...previous, isActive: false }), null, 2)}\n`);
      }
    }
    await writeFile(join(dir, target), `${JSON.stringify(toRecord(metadata), null, 2)}\n`);
  }

  private async readMetadata(path: string): Promise<BlockMetadata | undefined> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (err) {
      this.logger.warn(`skipping unreadable metadata ${path}: ${errorMessage(err)}`);
      return undefined;
    }
    const result = metadataRecordSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn(`skipping malformed metadata ${path}`);
      return undefined;
    }
    return result.data;
  }

  private async load(): Promise<void> {
    const { home } = this.options;
    await mkdir(home, { recursive: true });

    for (const entry of await readdir(home, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const dir = join(home, entry.name, 'metadata');
      const files = await readdir(dir).catch((): string[] => []);

      const versions: BlockMetadata[] = [];
      for (const file of files) {
        if (!file.endsWith('.json')) continue;
        const metadata = await this.readMetadata(join(dir, file));
        if (metadata) versions.push(metadata);
      }
      const chosen =
        versions.find((m) => m.isActive) ?? [...versions].sort((a, b) => b.lastUpdated.localeCompare(a.lastUpdated))[0];
      if (!chosen) continue;

      try {
        await access(chosen.binaryPath);
      } catch {
        throw new PackageError(
          `block '${chosen.name}' metadata exists but binary is missing: ${chosen.binaryPath}`,
          chosen.sourceRepo,
        );
      }
      this.blocks.set(chosen.name, chosen);
    }

    if (this.blocks.size > 0) {
      this.logger.debug(`loaded existing installation with ${this.blocks.size} blocks`);
    }
  }
}
