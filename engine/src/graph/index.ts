/**
 * Flow Graph
 *
 * Central exports for graph analysis utilities.
 *
 * Flow:
 * 1. GraphIndexBuilder - Build inbound/outbound adjacency
 * 2. CycleDetector - Find the first cycle
 * 3. ReachabilityAnalyzer - Find nodes no start node reaches
 * 4. PathEnumerator - List every root-to-terminal path
 */

export { GraphIndexBuilder, buildIndex } from './GraphIndexBuilder.js';
export { CycleDetector, VisitState, type CycleDetectionResult } from './CycleDetector.js';
export { ReachabilityAnalyzer, type ReachabilityResult } from './ReachabilityAnalyzer.js';
export {
  PathEnumerator,
  MAX_PATH_DEPTH,
  enumeratePaths,
  type EnumerateOptions,
} from './PathEnumerator.js';
