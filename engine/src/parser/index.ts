/**
 * Flow document parsing
 *
 * @module parser
 */

export * from './FlowSchema.js';
export * from './FlowParser.js';
