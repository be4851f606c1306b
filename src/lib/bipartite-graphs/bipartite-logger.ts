/**
 * Logger for bipartite graph algorithms
 *
 * Usage: Enable via environment variable
 *   DEBUG=bipartite npm test
 *
 * Or set LOG_LEVEL=debug for all logs
 */

import { ConsoleTransport, LogLayer } from 'loglayer';

import { env } from '@/lib/config/env';

// ============================================================================
// Constants
// ============================================================================

/** Logger prefix for bipartite graph logs */
const LOGGER_PREFIX = '[BIPARTITE]';

/** Environment variable keyword for enabling bipartite logs */
const DEBUG_KEYWORD = 'bipartite';

/** Log level for debug output */
const LOG_LEVEL_DEBUG = 'debug';

/** Log level for info output (default) */
const LOG_LEVEL_INFO = 'info';

type BipartiteLogLevel = typeof LOG_LEVEL_DEBUG | typeof LOG_LEVEL_INFO;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Determines log level based on environment variables
 *
 * Returns debug level if either:
 * - DEBUG environment variable contains 'bipartite' keyword
 * - LOG_LEVEL environment variable is set to 'debug'
 *
 * Otherwise returns info level (effectively disabling debug logs)
 */
function determineLogLevel(): BipartiteLogLevel {
  const debugEnvContainsKeyword = env.DEBUG?.includes(DEBUG_KEYWORD) ?? false;
  const logLevelIsDebug = env.LOG_LEVEL === LOG_LEVEL_DEBUG;

  const shouldEnableDebug = debugEnvContainsKeyword || logLevelIsDebug;

  return shouldEnableDebug ? LOG_LEVEL_DEBUG : LOG_LEVEL_INFO;
}

// ============================================================================
// Logger Instance
// ============================================================================

const logLevel = determineLogLevel();

/**
 * Logger instance for bipartite graph debugging
 *
 * Controlled via environment variables:
 * - DEBUG=bipartite (enable bipartite logs specifically)
 * - LOG_LEVEL=debug (enable all debug logs)
 */
export const bipartiteLogger = new LogLayer({
  prefix: LOGGER_PREFIX,
  transport: new ConsoleTransport({
    logger: console,
    level: logLevel,
    messageField: 'msg',
    stringify: true,
  }),
});

/**
 * Whether debug logging is currently enabled
 *
 * Use this to conditionally create debug-only variables to avoid overhead
 * when logging is disabled
 */
export const IS_BIPARTITE_DEBUG_ENABLED = logLevel === LOG_LEVEL_DEBUG;

// ============================================================================
// Debug Logging Interfaces
// ============================================================================

/**
 * Backward adjacency materialisation
 */
export interface CompletionInfo {
  /** Number of source vertices */
  readonly srcCount: number;

  /** Number of destination vertices */
  readonly dstCount: number;

  /** Number of edges transposed */
  readonly edgeCount: number;
}

/**
 * Source vertex deletion
 */
export interface VertexDeletionInfo {
  /** Ids whose adjacency was cleared */
  readonly deletedIds: number[];

  /** Whether the vertices were physically removed (renumbering the rest) */
  readonly removedVertices: boolean;

  /** Source count after deletion */
  readonly remainingSrcCount: number;
}

/**
 * Graph statistics at the start of a matching run
 */
export interface MatchingStartInfo {
  readonly srcCount: number;
  readonly dstCount: number;
  readonly edgeCount: number;
}

/**
 * Result of a matching run
 */
export interface MatchingResultInfo {
  /** Sources that passed the source filter and were tried */
  readonly triedSrcCount: number;

  /** Sources for which an augmenting path was found */
  readonly augmentedCount: number;

  /** Destinations holding a source at the end */
  readonly matchedCount: number;
}
