// packages/core/src/utils/constants.ts -- shared defaults

/** Name of the block manifest expected at a block repository's root. */
export const BLOCK_MANIFEST_FILE = 'agentic_support.yaml';

/** Project-level configuration file. */
export const CONFIG_FILENAME = '.blockflow.yml';

/** Directory under the user's home that holds installed blocks. */
export const DEFAULT_HOME_DIRNAME = '.blockflow';

export const GITHUB_API_URL = 'https://api.github.com';
export const GITHUB_RAW_URL = 'https://raw.githubusercontent.com';
export const GITHUB_TIMEOUT_MS = 30_000;

export const DEFAULT_MAX_PARALLEL = 4;

/** Stderr kept per failed block; anything beyond is dropped. */
export const STDERR_MAX_CHARS = 10_000;
