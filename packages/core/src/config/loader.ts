import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, TagshipConfig, TagshipConfigInput, TagshipConfigSchema } from '@tagship/shared';

type DeepPartial<T> = T extends Array<infer U>
  ? Array<U>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

/** Config values set from CLI flags; any subset of the file format */
export type ConfigOverrides = DeepPartial<TagshipConfigInput>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigOverrides;
  cwd?: string; // repository root, where .tagship.yaml lives
  env?: NodeJS.ProcessEnv;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_DIR = '.tagship';
export const REPO_CONFIG_FILE = '.tagship.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): PlainObject {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: PlainObject, source: PlainObject): PlainObject {
    const output: PlainObject = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Maps TAGSHIP_* variables onto config keys.
   */
  static fromEnv(env: NodeJS.ProcessEnv): PlainObject {
    const config: PlainObject = {};
    if (env.TAGSHIP_TOOL) {
      config.tool = env.TAGSHIP_TOOL;
    }
    if (env.TAGSHIP_REPO) {
      config.release = { repo: env.TAGSHIP_REPO };
    }
    if (env.TAGSHIP_STORE_DIR) {
      config.store = { dir: env.TAGSHIP_STORE_DIR };
    }
    return config;
  }

  static writeEffectiveConfig(config: TagshipConfig, dir: string): string {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const filePath = path.join(dir, 'effective-config.json');
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2), 'utf8');
    return filePath;
  }

  static load(options: ConfigOptions = {}): TagshipConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.tagship/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Repo config: <repoRoot>/.tagship.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: PlainObject = {};
    if (options.configPath) {
      const configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(configPath);
    }

    // Schema defaults fill whatever none of the layers set.
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, this.fromEnv(env));
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = TagshipConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
