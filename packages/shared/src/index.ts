export const name = '@tagship/shared';

export * from './types/events';
export * from './types/commands';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/path';
export * from './fs/io';
export * from './fs/runs';
export * from './config/schema';
export * from './summary/summary';
