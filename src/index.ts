/**
 * @fileoverview Dimension-aware ranking for retrieval-augmented generation
 *
 * Re-ranks vector-search candidates by blending semantic similarity with
 * conceptual-dimension alignment, recency and confidence, weighted by a
 * profile detected from the query.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createCompositeRanker } from 'dimension-ranker';
 *
 * const ranker = await createCompositeRanker({ index, store });
 * const response = await ranker.rank('novel methodology for protein folding', 10);
 * for (const result of response.results) {
 *   console.log(result.chunkId, result.compositeScore, result.explanation);
 * }
 * ```
 *
 * `index` supplies query embeddings and similarity candidates; `store` supplies
 * the per-chunk dimension scores, recency and confidence computed at ingest.
 *
 * @packageDocumentation
 */

// ============================================================================
// RANKER
// ============================================================================

export {
  CompositeRanker,
  createCompositeRanker,
  compositeScore,
  dimensionOnlyWeights,
  type CompositeRankerOptions,
  type CreateCompositeRankerOptions,
  type QueryPreview,
  type RankerStats,
} from './query/composite_ranker.js';

export {
  FallbackController,
  type FallbackDecision,
  type DecisionReason,
  type CallOutcome,
  type AdaptiveState,
} from './query/fallback_controller.js';

// ============================================================================
// QUERY UNDERSTANDING & SCORING
// ============================================================================

export { FilterParser, type PhraseMatch } from './query/filter_parser.js';
export {
  ProfileDetector,
  scoreProfile,
  type ProfileDetection,
  type ProfileScore,
} from './query/profile_detector.js';
export {
  AlignmentCalculator,
  constraintFails,
  averageConfidence,
  findBestMatchingProfile,
  type AlignmentInput,
  type AlignmentBreakdown,
  type DimensionContribution,
  type ConstraintThresholds,
} from './query/alignment.js';
export { normalizeQueryText, computeQueryFingerprint, embeddingCacheKey } from './query/fingerprint.js';

// ============================================================================
// PROFILES
// ============================================================================

export {
  ProfileRegistry,
  ProfileRegistryHandle,
  dimensionMultiplier,
  DEFAULT_PROFILE_ID,
  DEFAULT_DIMENSION_MULTIPLIER,
  WEIGHT_SUM_TOLERANCE,
  type Profile,
  type ProfileRegistrySource,
} from './profiles/registry.js';

// ============================================================================
// CACHING
// ============================================================================

export {
  ScoreCache,
  TtlFifoCache,
  alignmentCacheKey,
  type CacheStore,
  type CacheStats,
  type ScoreCacheStats,
  type ScoreCacheOptions,
  type TtlFifoCacheOptions,
  type EvictionReason,
  type AlignmentCacheKey,
} from './storage/score_cache.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export * from './config/index.js';

// ============================================================================
// ERRORS, RESULTS & LOGGING
// ============================================================================

export {
  RankerError,
  ConfigurationError,
  UnknownProfileError,
  CandidateFetchError,
  ScoringError,
  CacheUnavailableError,
  InvalidRequestError,
  Errors,
  isRankerError,
  isConfigurationError,
  isCacheUnavailableError,
  isRetryableError,
  type CacheName,
  type ErrorJSON,
} from './core/errors.js';
export { Ok, Err, type Result } from './core/result.js';
export { TimeoutError } from './utils/async.js';
export {
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  type LogLevel,
} from './telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type {
  ChunkId,
  DimensionScore,
  DimensionScores,
  CandidateHit,
  SimilarityIndex,
  ChunkStore,
  FilterConstraint,
  RankingFactor,
  FactorScores,
  ScoredCandidate,
  RankingState,
  ExecutionMode,
  DegradationReason,
  ProfileSource,
  RankingTimings,
  RankingResponse,
} from './types.js';
export { RANKING_FACTORS } from './types.js';
