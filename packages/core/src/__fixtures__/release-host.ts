import { ReleaseExistsError } from '@tagship/shared';
import type {
  CreateReleaseRequest,
  ReleaseHost,
  ReleaseInfo,
  UploadedAsset,
} from '../release/host';

type HostMethod = 'findRelease' | 'createRelease' | 'uploadAsset' | 'publishRelease' | 'deleteRelease';

/**
 * In-process release host. `failures` queues errors to throw from the next
 * calls of the named method; an `undefined` entry lets that call through.
 */
export class InMemoryReleaseHost implements ReleaseHost {
  readonly releases = new Map<string, ReleaseInfo>();
  readonly assets = new Map<number, Map<string, Buffer>>();
  readonly calls: string[] = [];
  readonly failures: Record<HostMethod, unknown[]> = {
    findRelease: [],
    createRelease: [],
    uploadAsset: [],
    publishRelease: [],
    deleteRelease: [],
  };
  private nextId = 1;

  async findRelease(tag: string): Promise<ReleaseInfo | undefined> {
    this.calls.push(`find ${tag}`);
    this.failNext('findRelease');
    return this.releases.get(tag);
  }

  async createRelease(request: CreateReleaseRequest): Promise<ReleaseInfo> {
    this.calls.push(`create ${request.tag}`);
    this.failNext('createRelease');
    if (this.releases.has(request.tag)) {
      throw new ReleaseExistsError(request.tag);
    }
    const id = this.nextId++;
    const info: ReleaseInfo = {
      id,
      tag: request.tag,
      name: request.name,
      url: `https://example.test/releases/${request.tag}`,
      uploadUrl: `https://example.test/uploads/${id}{?name,label}`,
      draft: request.draft,
    };
    this.releases.set(request.tag, info);
    this.assets.set(id, new Map());
    return info;
  }

  async uploadAsset(release: ReleaseInfo, fileName: string, data: Buffer): Promise<UploadedAsset> {
    this.calls.push(`upload ${fileName}`);
    this.failNext('uploadAsset');
    this.assets.get(release.id)?.set(fileName, data);
    return { name: fileName, url: `https://example.test/download/${release.tag}/${fileName}` };
  }

  async publishRelease(release: ReleaseInfo): Promise<ReleaseInfo> {
    this.calls.push(`publish ${release.tag}`);
    this.failNext('publishRelease');
    const published = { ...release, draft: false };
    this.releases.set(release.tag, published);
    return published;
  }

  async deleteRelease(release: ReleaseInfo): Promise<void> {
    this.calls.push(`delete ${release.tag}`);
    this.failNext('deleteRelease');
    this.releases.delete(release.tag);
    this.assets.delete(release.id);
  }

  assetNames(tag: string): string[] {
    const release = this.releases.get(tag);
    return release ? [...(this.assets.get(release.id)?.keys() ?? [])] : [];
  }

  private failNext(method: HostMethod): void {
    const failure = this.failures[method].shift();
    if (failure !== undefined) {
      throw failure;
    }
  }
}
