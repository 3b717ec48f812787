import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { AuthenticationError, ReleaseExistsError, TransientError } from '@tagship/shared';
import { CreateReleaseRequest, ReleaseHost, ReleaseInfo, UploadedAsset } from './host';

export interface GitHubReleaseHostOptions {
  /** owner/name */
  repo: string;
  token: string;
  baseUrl?: string;
  /** Replaces the global fetch; used by tests */
  fetch?: typeof fetch;
}

const ValidationFailedSchema = z.object({
  errors: z.array(z.object({ code: z.string() })).default([]),
});

const UploadedAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
});

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function responseDataOf(error: unknown): unknown {
  if (
    typeof error === 'object' &&
    error !== null &&
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'data' in error.response
  ) {
    return error.response.data;
  }
  return undefined;
}

function isAlreadyExists(error: unknown): boolean {
  if (statusOf(error) !== 422) return false;
  const parsed = ValidationFailedSchema.safeParse(responseDataOf(error));
  return parsed.success && parsed.data.errors.some((e) => e.code === 'already_exists');
}

interface ReleaseData {
  id: number;
  tag_name: string;
  name: string | null;
  html_url: string;
  upload_url: string;
  draft: boolean;
}

function toReleaseInfo(data: ReleaseData): ReleaseInfo {
  return {
    id: data.id,
    tag: data.tag_name,
    name: data.name ?? data.tag_name,
    url: data.html_url,
    uploadUrl: data.upload_url,
    draft: data.draft,
  };
}

/**
 * Maps Octokit request errors onto the pipeline's error kinds.
 */
function mapRequestError(error: unknown, action: string): unknown {
  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status === 401 || status === 403) {
    return new AuthenticationError(`GitHub rejected the credential while trying to ${action}`, {
      status,
      cause: error,
    });
  }
  if (status !== undefined && (status === 429 || status >= 500)) {
    return new TransientError(`GitHub returned ${status} while trying to ${action}: ${message}`, {
      status,
      cause: error,
    });
  }
  return error;
}

export class GitHubReleaseHost implements ReleaseHost {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;

  constructor(options: GitHubReleaseHostOptions) {
    const [owner, repo] = options.repo.split('/');
    if (!owner || !repo) {
      throw new TypeError(`Repository must be owner/name, got "${options.repo}"`);
    }
    this.owner = owner;
    this.repo = repo;
    this.octokit = new Octokit({
      auth: options.token,
      userAgent: 'tagship',
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    });
  }

  async findRelease(tag: string): Promise<ReleaseInfo | undefined> {
    try {
      const { data } = await this.octokit.rest.repos.getReleaseByTag({
        owner: this.owner,
        repo: this.repo,
        tag,
      });
      return toReleaseInfo(data);
    } catch (error) {
      if (statusOf(error) === 404) {
        return undefined;
      }
      throw mapRequestError(error, `look up release ${tag}`);
    }
  }

  async createRelease(request: CreateReleaseRequest): Promise<ReleaseInfo> {
    try {
      const { data } = await this.octokit.rest.repos.createRelease({
        owner: this.owner,
        repo: this.repo,
        tag_name: request.tag,
        name: request.name,
        body: request.body,
        draft: request.draft,
        prerelease: request.prerelease,
      });
      return toReleaseInfo(data);
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new ReleaseExistsError(request.tag, { cause: error });
      }
      throw mapRequestError(error, `create release ${request.tag}`);
    }
  }

  async uploadAsset(release: ReleaseInfo, fileName: string, data: Buffer): Promise<UploadedAsset> {
    // upload_url is a URI template ending in {?name,label}; only name is sent
    const url = release.uploadUrl.replace(/\{\?[^}]*\}$/, '');
    try {
      const response = await this.octokit.request('POST {+url}{?name}', {
        url,
        name: fileName,
        data,
        headers: {
          'content-type': 'application/octet-stream',
          'content-length': data.length,
        },
      });
      const asset = UploadedAssetSchema.parse(response.data);
      return { name: asset.name, url: asset.browser_download_url };
    } catch (error) {
      throw mapRequestError(error, `upload ${fileName}`);
    }
  }

  async publishRelease(release: ReleaseInfo): Promise<ReleaseInfo> {
    try {
      const { data } = await this.octokit.rest.repos.updateRelease({
        owner: this.owner,
        repo: this.repo,
        release_id: release.id,
        draft: false,
      });
      return toReleaseInfo(data);
    } catch (error) {
      throw mapRequestError(error, `publish release ${release.tag}`);
    }
  }

  async deleteRelease(release: ReleaseInfo): Promise<void> {
    try {
      await this.octokit.rest.repos.deleteRelease({
        owner: this.owner,
        repo: this.repo,
        release_id: release.id,
      });
    } catch (error) {
      throw mapRequestError(error, `delete release ${release.tag}`);
    }
  }
}
