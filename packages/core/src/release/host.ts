export interface ReleaseInfo {
  id: number;
  tag: string;
  name: string;
  /** Human-facing page of the release */
  url: string;
  /** URI template that assets are posted to */
  uploadUrl: string;
  draft: boolean;
}

export interface CreateReleaseRequest {
  tag: string;
  name: string;
  body?: string;
  draft: boolean;
  prerelease: boolean;
}

export interface UploadedAsset {
  name: string;
  url: string;
}

/**
 * The remote service that holds releases. Only the publisher talks to it.
 */
export interface ReleaseHost {
  findRelease(tag: string): Promise<ReleaseInfo | undefined>;
  /** Throws `ReleaseExistsError` if the tag already has a release */
  createRelease(request: CreateReleaseRequest): Promise<ReleaseInfo>;
  uploadAsset(release: ReleaseInfo, fileName: string, data: Buffer): Promise<UploadedAsset>;
  /** Turns a draft into a published release */
  publishRelease(release: ReleaseInfo): Promise<ReleaseInfo>;
  deleteRelease(release: ReleaseInfo): Promise<void>;
}
