export const name = '@tagship/core';

export * from './config/loader';
export * from './common/retry';
export * from './version/resolver';
export * from './version/tag';
export * from './matrix/targets';
export * from './build/steps';
export * from './build/executor';
export * from './package/naming';
export * from './package/packager';
export * from './store/artifact-store';
export * from './release/host';
export * from './release/github';
export * from './release/lockfile';
export * from './release/publisher';
export * from './pipeline/jobs';
export * from './pipeline/pipeline';
export * from './pipeline/factory';
export * from './workflow/generator';
