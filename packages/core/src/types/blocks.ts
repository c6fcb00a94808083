// packages/core/src/types/blocks.ts

/** One typed port of an entry, as declared by the block manifest. */
export interface EntryPort {
  name: string;
  type: string;
}

/** A command a block's CLI exposes. */
export interface BlockEntry {
  name: string;
  command: string;
  description: string;
  inputs: EntryPort[];
  outputs: EntryPort[];
}

/** Parsed `agentic_support.yaml` with entries keyed by name. */
export interface BlockInfo {
  name: string;
  description: string;
  version: string;
  source: { type: string; repo: string };
  binary: { from: string; assets: Record<string, string> };
  entries: Record<string, BlockEntry>;
}

/** Metadata persisted for an installed block version. */
export interface BlockMetadata {
  name: string;
  version: string;
  sourceRepo: string;
  binaryPath: string;
  installedAt: string;
  lastUpdated: string;
  isActive: boolean;
  entries: Record<string, BlockEntry>;
}

export interface InstallRequest {
  /** `owner/repo` */
  repo: string;
  /** Release tag; empty installs the latest release. */
  version?: string;
  /** Reinstall even if the block is already present. */
  force?: boolean;
}

export interface UpdateResult {
  /** Metadata of the version now installed. */
  metadata: BlockMetadata;
  previousVersion: string;
  /** False when the block was already at the requested version. */
  updated: boolean;
}

/** The only surface of the package manager the workflow core depends on. */
export interface BlockInstaller {
  install(request: InstallRequest): Promise<BlockMetadata>;
}

export interface ReleaseAsset {
  id: number;
  name: string;
  size: number;
  contentType: string;
  downloadUrl: string;
}

export interface Release {
  tagName: string;
  name: string;
  assets: ReleaseAsset[];
  publishedAt: string;
}

export interface InstallationStats {
  homeDir: string;
  totalBlocks: number;
  totalBinaryBytes: number;
  blocks: BlockMetadata[];
}
