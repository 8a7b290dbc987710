export const name = '@promptctx/core';

export * from './conversation/window';
export * from './exec/messages';
export * from './exec/serial_executor';
export * from './exec/service';
export * from './config/loader';
