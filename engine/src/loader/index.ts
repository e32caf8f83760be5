/**
 * Flow Loader Module
 *
 * I/O-aware, analysis-agnostic loading of flow documents.
 *
 * @module loader
 */

export * from './FlowLoader.js';
