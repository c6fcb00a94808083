import { describe, expect, it } from 'vitest';
import { platformKey } from '../../../src/blocks/platform.js';

describe('platformKey', () => {
  it('maps node names onto release asset names', () => {
    expect(platformKey('linux', 'x64')).toBe('linux-amd64');
    expect(platformKey('win32', 'x64')).toBe('windows-amd64');
    expect(platformKey('linux', 'ia32')).toBe('linux-386');
  });

  it('passes other names through', () => {
    expect(platformKey('darwin', 'arm64')).toBe('darwin-arm64');
    expect(platformKey('freebsd', 'riscv64')).toBe('freebsd-riscv64');
  });

  it('defaults to the running process', () => {
    expect(platformKey()).toBe(platformKey(process.platform, process.arch));
  });
});
