// Public API of the SIC/XE assembler package.
export * from './analyzer.js';
export * from './assembler.js';
export * from './context.js';
export * from './encoder.js';
export * from './error-catalog.js';
export * from './errors.js';
export * from './expression.js';
export * from './instruction-table.js';
export * from './lexer.js';
export * from './listing.js';
export * from './literals.js';
export * from './location-counter.js';
export * from './pass1.js';
export * from './pass2.js';
export * from './reporter.js';
export * from './symbol-table.js';
export * from './types.js';
