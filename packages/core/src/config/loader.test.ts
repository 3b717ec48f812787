import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from './loader';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@tagship/shared';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.tagship', 'config.yaml');
  const repoPath = path.join(mockCwd, '.tagship.yaml');

  function withFiles(files: Record<string, unknown>) {
    vi.mocked(fs.existsSync).mockImplementation((p) => String(p) in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => {
      const content = files[String(p)];
      return typeof content === 'string' ? content : yaml.dump(content);
    });
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('should fill schema defaults around the repo config', () => {
      withFiles({ [repoPath]: { tool: 'mytool' } });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });

      expect(config.tool).toBe('mytool');
      expect(config.configVersion).toBe(1);
      expect(config.matrix.failFast).toBe(true);
      expect(config.matrix.targets.map((t) => t.triple)).toEqual([
        'x86_64-unknown-linux-gnu',
        'x86_64-unknown-linux-musl',
      ]);
      expect(config.matrix.host?.triple).toBe('x86_64-apple-darwin');
      expect(config.release.tokenEnv).toBe('GITHUB_TOKEN');
      expect(config.lockfile).toEqual({ path: 'Cargo.lock', command: 'cargo update' });
    });

    it('should fail when no layer names the tool', () => {
      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(
        /Configuration validation failed:\n- tool: Required/,
      );
    });

    it('should respect precedence: flags > env > explicit > repo > user', () => {
      withFiles({
        [userPath]: { tool: 'user-tool', store: { dir: 'user-store' }, retry: { maxRetries: 5 } },
        [repoPath]: { tool: 'repo-tool', release: { repo: 'acme/repo' } },
        '/explicit/config.yaml': { tool: 'explicit-tool', release: { draft: true } },
      });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        env: { TAGSHIP_TOOL: 'env-tool', TAGSHIP_STORE_DIR: 'env-store' },
        flags: { tool: 'flag-tool' },
      });

      expect(config.tool).toBe('flag-tool');
      expect(config.store.dir).toBe('env-store');
      expect(config.retry.maxRetries).toBe(5);
      expect(config.release.repo).toBe('acme/repo');
      expect(config.release.draft).toBe(true);
    });

    it('should replace arrays instead of merging them', () => {
      withFiles({
        [userPath]: {
          tool: 'mytool',
          matrix: { targets: [{ triple: 'aarch64-unknown-linux-gnu' }, { triple: 'i686-unknown-linux-gnu' }] },
        },
        [repoPath]: { matrix: { targets: [{ triple: 'x86_64-unknown-linux-gnu' }] } },
      });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });

      expect(config.matrix.targets).toEqual([
        { triple: 'x86_64-unknown-linux-gnu', runsOn: 'ubuntu-latest', systemPackages: [] },
      ]);
    });

    it('should read TAGSHIP_REPO into release.repo', () => {
      withFiles({ [repoPath]: { tool: 'mytool' } });

      const config = ConfigLoader.load({ cwd: mockCwd, env: { TAGSHIP_REPO: 'acme/tool' } });

      expect(config.release.repo).toBe('acme/tool');
    });

    it('should resolve the explicit path against cwd', () => {
      withFiles({ [path.join(mockCwd, 'ci/tagship.yaml')]: { tool: 'ci-tool' } });

      const config = ConfigLoader.load({ cwd: mockCwd, configPath: 'ci/tagship.yaml', env: {} });

      expect(config.tool).toBe('ci-tool');
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ cwd: mockCwd, configPath: '/missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should fail on invalid YAML', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('invalid: yaml: :');

      expect(() => ConfigLoader.load({ cwd: mockCwd, configPath: '/invalid.yaml' })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('should reject a config file that is not a mapping', () => {
      withFiles({ [repoPath]: '- just\n- a list\n' });

      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(ConfigError);
    });

    it('should name the offending path on schema errors', () => {
      withFiles({ [repoPath]: { tool: 'mytool', matrix: { maxParallel: 0 } } });

      expect(() => ConfigLoader.load({ cwd: mockCwd, env: {} })).toThrow(/- matrix\.maxParallel:/);
    });
  });

  describe('mergeConfigs', () => {
    it('should deep merge objects', () => {
      const target = { a: 1, b: { c: 2, d: 3 } };
      const source = { b: { c: 4 }, e: 5 };
      expect(ConfigLoader.mergeConfigs(target, source)).toEqual({ a: 1, b: { c: 4, d: 3 }, e: 5 });
    });

    it('should skip undefined values', () => {
      expect(ConfigLoader.mergeConfigs({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });

    it('should let null replace a value', () => {
      expect(ConfigLoader.mergeConfigs({ host: { triple: 'x' } }, { host: null })).toEqual({
        host: null,
      });
    });
  });

  describe('writeEffectiveConfig', () => {
    it('should write pretty JSON into the directory', () => {
      withFiles({ [repoPath]: { tool: 'mytool' } });
      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });

      const filePath = ConfigLoader.writeEffectiveConfig(config, '/runs/r1');

      expect(filePath).toBe(path.join('/runs/r1', 'effective-config.json'));
      expect(fs.mkdirSync).toHaveBeenCalledWith('/runs/r1', { recursive: true });
      expect(fs.writeFileSync).toHaveBeenCalledWith(
        filePath,
        JSON.stringify(config, null, 2),
        'utf8',
      );
    });
  });
});
