// src/index.ts
// Entry point
export * from './types';
export * from './errors';
export * from './lexer';
export * from './parser';
export * from './numbers';
export * from './evaluator';
export { createLogger } from './logger';
