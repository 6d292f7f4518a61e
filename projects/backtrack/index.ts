export * from './ast.js';
export * from './ast-util.js';
export * from './errors.js';
export * from './matcher.js';
export * from './parser.js';
export * from './pattern.js';
export * from './text.js';
export * from './tracer.js';
