// packages/core/src/blocks -- Block installation from GitHub releases

export { PackageManager } from './package-manager.js';
export type { PackageManagerOptions } from './package-manager.js';
export { GithubClient, tagCandidates } from './github-client.js';
export type { GithubClientOptions } from './github-client.js';
export { parseBlockManifest, blockManifestSchema, blockEntrySchema } from './block-manifest.js';
export { platformKey } from './platform.js';
