/**
 * markspan - incremental inline-markup attributes for an append-only paragraph
 *
 * Main entry point exporting core types, the session and its building blocks.
 */

export * from './types/index.ts';
export * from './store/index.ts';
