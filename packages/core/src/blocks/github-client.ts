// packages/core/src/blocks/github-client.ts

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { Release, ReleaseAsset } from '../types/blocks.js';
import { BLOCK_MANIFEST_FILE, GITHUB_API_URL, GITHUB_RAW_URL, GITHUB_TIMEOUT_MS } from '../utils/constants.js';
import { PackageError, errorMessage } from '../utils/errors.js';

export interface GithubClientOptions {
  token?: string;
  apiUrl?: string;
  rawUrl?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport; tests serve responses in process. */
  adapter?: AxiosAdapter;
}

const assetSchema = z.object({
  id: z.number(),
  name: z.string(),
  size: z.number().default(0),
  content_type: z.string().default('application/octet-stream'),
  browser_download_url: z.string().default(''),
});

const releaseSchema = z
  .object({
    tag_name: z.string(),
    name: z.string().nullish(),
    assets: z.array(assetSchema).default([]),
    published_at: z.string().nullish(),
  })
  .transform(
    (r): Release => ({
      tagName: r.tag_name,
      name: r.name ?? r.tag_name,
      publishedAt: r.published_at ?? '',
      assets: r.assets.map(
        (a): ReleaseAsset => ({
          id: a.id,
          name: a.name,
          size: a.size,
          contentType: a.content_type,
          downloadUrl: a.browser_download_url,
        }),
      ),
    }),
  );

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data.trim();
  if (Buffer.isBuffer(data)) return data.toString('utf-8').trim();
  return JSON.stringify(data);
}

/** Tag spellings tried for a requested version: with a leading "v", then without. */
export function tagCandidates(tag: string): string[] {
  const withV = tag.startsWith('v') ? tag : `v${tag}`;
  const withoutV = tag.startsWith('v') ? tag.slice(1) : tag;
  return [...new Set([withV, withoutV])];
}

/**
 * Thin GitHub REST client covering what the package manager needs:
 * release lookup, raw file fetch and release-asset download.
 */
export class GithubClient {
  private api: AxiosInstance;
  private raw: AxiosInstance;

  constructor(options: GithubClientOptions = {}) {
    const headers: Record<string, string> = {};
    if (options.token) headers.Authorization = `Bearer ${options.token}`;

    const common = {
      timeout: options.timeoutMs ?? GITHUB_TIMEOUT_MS,
      // Statuses are interpreted per call; only transport failures throw.
      validateStatus: () => true,
      adapter: options.adapter,
    };
    this.api = axios.create({
      ...common,
      baseURL: options.apiUrl ?? GITHUB_API_URL,
      headers: { ...headers, Accept: 'application/vnd.github+json' },
    });
    this.raw = axios.create({
      ...common,
      baseURL: options.rawUrl ?? GITHUB_RAW_URL,
      headers,
    });
  }

  async getLatestRelease(repo: string): Promise<Release> {
    const response = await this.send(repo, () => this.api.get<unknown>(`/repos/${repo}/releases/latest`));
    if (response.status === 404) {
      throw new PackageError(`no releases found for ${repo}`, repo, 404);
    }
    this.checkStatus(repo, response, 'latest release');
    return this.decodeRelease(repo, response.data);
  }

  /** Look up a release by tag, accepting the tag with or without a leading "v". */
  async getReleaseByTag(repo: string, tag: string): Promise<Release> {
    for (const candidate of tagCandidates(tag)) {
      const response = await this.send(repo, () =>
        this.api.get<unknown>(`/repos/${repo}/releases/tags/${encodeURIComponent(candidate)}`),
      );
      if (response.status === 404) continue;
      this.checkStatus(repo, response, `tag '${candidate}'`);
      return this.decodeRelease(repo, response.data);
    }
    throw new PackageError(`release not found for tag '${tag}' in ${repo} (tried with/without 'v')`, repo, 404);
  }

  /** Fetch the block manifest at the repository root for `ref`. */
  async fetchBlockManifest(repo: string, ref: string): Promise<string> {
    const response = await this.send(repo, () =>
      this.raw.get<string>(`/${repo}/${encodeURIComponent(ref)}/${BLOCK_MANIFEST_FILE}`, { responseType: 'text' }),
    );
    if (response.status === 404) {
      throw new PackageError(`no ${BLOCK_MANIFEST_FILE} found in ${repo} at ${ref}`, repo, 404);
    }
    this.checkStatus(repo, response, BLOCK_MANIFEST_FILE);
    return describeBody(response.data);
  }

  async downloadAsset(repo: string, asset: ReleaseAsset): Promise<Buffer> {
    const response = await this.send(repo, () =>
      this.api.get<ArrayBuffer>(`/repos/${repo}/releases/assets/${asset.id}`, {
        responseType: 'arraybuffer',
        headers: { Accept: 'application/octet-stream' },
      }),
    );
    this.checkStatus(repo, response, `asset '${asset.name}'`);
    return Buffer.from(response.data);
  }

  private async send<T>(repo: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (err) {
      throw new PackageError(`request to GitHub failed for ${repo}: ${errorMessage(err)}`, repo, undefined, {
        cause: err,
      });
    }
  }

  private checkStatus(repo: string, response: AxiosResponse, what: string): void {
    const { status } = response;
    if (status >= 200 && status < 300) return;
    if (status === 401 || status === 403) {
      throw new PackageError(`authentication failed for ${repo} - check GITHUB_TOKEN`, repo, status);
    }
    throw new PackageError(`GitHub API error ${status} for ${what}: ${describeBody(response.data)}`, repo, status);
  }

  private decodeRelease(repo: string, data: unknown): Release {
    const result = releaseSchema.safeParse(data);
    if (!result.success) {
      throw new PackageError(`unexpected release payload for ${repo}: ${result.error.issues[0]?.message ?? 'invalid shape'}`, repo);
    }
    return result.data;
  }
}
