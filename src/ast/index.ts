// src/ast/index.ts

export * from './lexer';
export * from './modifiers';
export * from './sections';
export * from './builder';
export * from './format';
