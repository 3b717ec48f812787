export const name = '@tagship/exec';

export * from './classify/types';
export * from './classify/parser';
export * from './runner/runner';
