import { z } from 'zod';

/**
 * One entry of the build matrix. `triple` names platform, architecture and linkage.
 */
export const BuildTargetSchema = z.object({
  triple: z
    .string()
    .regex(/^[a-z0-9_]+(-[a-z0-9_]+){1,3}$/, 'target triple must look like arch-vendor-os[-env]'),
  runsOn: z.string().default('ubuntu-latest'),
  /** System packages the target needs before compiling, e.g. musl-tools */
  systemPackages: z.array(z.string()).default([]),
});

export const DEFAULT_TARGETS = [
  { triple: 'x86_64-unknown-linux-gnu', runsOn: 'ubuntu-latest', systemPackages: [] },
  { triple: 'x86_64-unknown-linux-musl', runsOn: 'ubuntu-latest', systemPackages: ['musl-tools'] },
];

export const DEFAULT_HOST_TARGET = {
  triple: 'x86_64-apple-darwin',
  runsOn: 'macos-latest',
  systemPackages: [],
};

export const MatrixConfigSchema = z.object({
  targets: z.array(BuildTargetSchema).default(DEFAULT_TARGETS),
  /** Built on its own runner without an explicit --target; null disables it */
  host: BuildTargetSchema.nullable().default(DEFAULT_HOST_TARGET),
  /** Cancel jobs that have not started once one fails */
  failFast: z.boolean().default(true),
  /** Upper bound on concurrently running build jobs; unbounded when unset */
  maxParallel: z.number().int().min(1).optional(),
});

export const ProjectConfigSchema = z.object({
  /** Where the version comes from */
  metadata: z.enum(['cargo', 'npm']).default('cargo'),
  /** Project root relative to the repository root */
  root: z.string().default('.'),
});

export const ToolchainConfigSchema = z.object({
  channel: z.string().default('stable'),
  profile: z.enum(['minimal', 'default', 'complete']).default('minimal'),
  /** Prefix used to install system packages; package names are appended */
  systemInstallCommand: z.string().default('sudo apt-get install -y'),
  stripCommand: z.string().default('strip'),
  /** Skip toolchain installation when the runner already provides it */
  skipInstall: z.boolean().default(false),
});

export const StoreConfigSchema = z.object({
  dir: z.string().default('.tagship/artifacts'),
});

export const LockfileConfigSchema = z.object({
  path: z.string().default('Cargo.lock'),
  command: z.string().default('cargo update'),
});

export const ReleaseConfigSchema = z.object({
  /** owner/name of the repository that receives the release */
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'repo must be in owner/name format')
    .optional(),
  /** Name of the environment variable holding the release credential */
  tokenEnv: z.string().default('GITHUB_TOKEN'),
  /** Fail when the tag and the resolved version differ */
  requireTagMatch: z.boolean().default(true),
  draft: z.boolean().default(false),
  prerelease: z.boolean().default(false),
  body: z.string().optional(),
  apiBaseUrl: z.string().url().optional(),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(2),
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(10_000),
  backoffFactor: z.number().min(1).default(2),
});

export const ExecConfigSchema = z.object({
  timeoutMs: z.number().min(1000).default(1_800_000),
  maxOutputBytes: z.number().default(16 * 1024 * 1024),
  /** Extra environment variables passed through to toolchain commands */
  envAllowlist: z
    .array(z.string())
    .default(['CARGO_HOME', 'RUSTUP_HOME', 'RUSTFLAGS', 'CC', 'CXX', 'CI', 'DEBIAN_FRONTEND']),
  allowShell: z.boolean().default(false),
});

export const TagshipConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Name of the binary being released; also the archive name prefix */
  tool: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'tool must be a plain binary name'),
  project: ProjectConfigSchema.default({}),
  toolchain: ToolchainConfigSchema.default({}),
  matrix: MatrixConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  lockfile: LockfileConfigSchema.default({}),
  release: ReleaseConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  exec: ExecConfigSchema.default({}),
});

export type BuildTargetConfig = z.infer<typeof BuildTargetSchema>;
export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ToolchainConfig = z.infer<typeof ToolchainConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type LockfileConfig = z.infer<typeof LockfileConfigSchema>;
export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type ExecConfig = z.infer<typeof ExecConfigSchema>;
export type TagshipConfig = z.infer<typeof TagshipConfigSchema>;
export type TagshipConfigInput = z.input<typeof TagshipConfigSchema>;
