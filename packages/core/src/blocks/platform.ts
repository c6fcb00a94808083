// packages/core/src/blocks/platform.ts

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'windows',
};

const ARCH_NAMES: Record<string, string> = {
  x64: 'amd64',
  ia32: '386',
};

/**
 * Key used in a block manifest's `binary.assets` map, e.g. `linux-amd64`
 * or `darwin-arm64`.
 */
export function platformKey(platform: NodeJS.Platform = process.platform, arch: string = process.arch): string {
  const os = OS_NAMES[platform] ?? platform;
  return `${os}-${ARCH_NAMES[arch] ?? arch}`;
}
