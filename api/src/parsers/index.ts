/**
 * Parsers Module Exports
 * @module parsers
 */

export * from './ci';
