/**
 * @delivery-filter/cli
 *
 * Public API exports for the CLI package
 */

export * from './core/argument-parser.js';
export * from './core/error-handler.js';
export * from './core/program.js';
export * from './core/run-application.js';
export * from './core/run-cli.js';
