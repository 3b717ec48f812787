import { TagshipConfig, TagshipConfigSchema } from '@tagship/shared';
import type { ConfigOverrides } from '../config/loader';
import { ConfigLoader } from '../config/loader';

/**
 * Fully defaulted config for `mytool` with fast retries, optionally overridden.
 */
export function configForTest(overrides: ConfigOverrides = {}): TagshipConfig {
  const base = {
    tool: 'mytool',
    retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5, backoffFactor: 2 },
    release: { repo: 'acme/mytool' },
  };
  return TagshipConfigSchema.parse(ConfigLoader.mergeConfigs(base, overrides));
}
