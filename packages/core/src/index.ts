/**
 * @expsync/core
 *
 * Foundational domain types and port interfaces for experiment storage.
 * This package has zero dependencies on other @expsync packages.
 */

export * from './domain/index.js';
export * from './ports/index.js';
export { ValidationError } from './errors.js';
