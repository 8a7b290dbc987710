export const name = '@promptctx/adapters';

export * from './types';
export * from './adapter';
export * from './errors';
export * from './base-adapter';
export * from './common';
export * from './openai/adapter';
export * from './fake/adapter';
export * from './factory';
