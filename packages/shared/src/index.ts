export const name = '@promptctx/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
export * from './scheduling';
