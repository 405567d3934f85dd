/**
 * @fileoverview Ranking configuration schema
 *
 * The on-disk layout is the sectioned, snake_case YAML document the ranking
 * service has always read (`retrieval`, `profiles`, `natural_language_filters`,
 * ...). `RawRankingConfigSchema` validates that shape and fills every default;
 * `toRankingConfig` turns it into the frozen camelCase `RankingConfig` the
 * ranker consumes.
 */

import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const RETRIEVAL_STRATEGIES = ['vector_only', 'dimension_only', 'hybrid', 'adaptive'] as const;
export type RetrievalStrategy = (typeof RETRIEVAL_STRATEGIES)[number];

/** Strategies the ranker may degrade to without dimension scores. */
export const FALLBACK_STRATEGIES = ['vector_only'] as const;
export type FallbackStrategy = (typeof FALLBACK_STRATEGIES)[number];

export const ALIGNMENT_METHODS = ['min', 'max', 'average', 'weighted_average'] as const;
export type AlignmentMethod = (typeof ALIGNMENT_METHODS)[number];

export const NORMALIZATION_MODES = ['none', 'total_weight', 'max_weight'] as const;
export type NormalizationMode = (typeof NORMALIZATION_MODES)[number];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

// ============================================================================
// RAW (ON-DISK) SCHEMA
// ============================================================================

const unitInterval = z.number().min(0).max(1);

const FilterTargetSchema = z.union([z.enum(['low', 'high']), unitInterval]);

const RawProfileSchema = z.object({
  description: z.string().optional(),
  target_users: z.array(z.string()).default([]),
  weights: z.object({
    semantic_similarity: unitInterval,
    dimension_alignment: unitInterval,
    recency_score: unitInterval,
    confidence_score: unitInterval,
  }),
  dimensions: z.record(z.number().positive()).default({}),
});

const RawFilterMappingSchema = z.union([
  z.object({
    constraints: z.record(FilterTargetSchema),
    confidence: unitInterval,
  }).strict(),
  z.record(FilterTargetSchema),
]);

export const RawRankingConfigSchema = z.object({
  retrieval: z.object({
    enable_dimension_ranking: z.boolean().default(true),
    default_strategy: z.enum(RETRIEVAL_STRATEGIES).default('hybrid'),
    max_candidates_multiplier: z.number().int().min(1).default(4),
    min_candidates: z.number().int().min(1).default(20),
    max_processing_time_ms: z.number().positive().default(200),
    enable_fallback: z.boolean().default(true),
    fallback_strategy: z.enum(FALLBACK_STRATEGIES).default('vector_only'),
    scoring_concurrency: z.number().int().min(1).default(4),
    external_call_timeout_ms: z.number().min(0).default(5000),
  }).default({}),

  adaptive: z.object({
    timeout_threshold: z.number().int().min(1).default(3),
    cooldown_queries: z.number().int().min(1).default(10),
  }).default({}),

  profiles: z.record(RawProfileSchema),

  natural_language_filters: z.object({
    enable_parsing: z.boolean().default(true),
    confidence_threshold: unitInterval.default(0.6),
    filter_strength: unitInterval.default(0.5),
    high_threshold: unitInterval.default(0.5),
    low_threshold: unitInterval.default(0.5),
    default_phrase_confidence: unitInterval.default(1.0),
    filter_mappings: z.record(RawFilterMappingSchema).default({}),
  }).default({}),

  auto_profile_detection: z.object({
    enable: z.boolean().default(true),
    confidence_threshold: unitInterval.default(0.7),
    patterns: z.record(z.array(z.string().min(1))).default({}),
  }).default({}),

  dimension_alignment: z.object({
    alignment_method: z.enum(ALIGNMENT_METHODS).default('min'),
    normalization: z.enum(NORMALIZATION_MODES).default('total_weight'),
    confidence_boost: z.object({
      enable: z.boolean().default(true),
      max_boost: unitInterval.default(0.1),
      threshold: unitInterval.default(0.5),
    }).default({}),
    profile_bonus: z.object({
      enable: z.boolean().default(true),
      same_profile_bonus: unitInterval.default(0.05),
      cross_profile_penalty: unitInterval.default(0),
    }).default({}),
  }).default({}),

  caching: z.object({
    enable_dimension_cache: z.boolean().default(true),
    cache_size: z.number().int().min(1).default(1000),
    cache_ttl: z.number().positive().default(3600),
    enable_query_cache: z.boolean().default(true),
    query_cache_size: z.number().int().min(1).default(100),
  }).default({}),

  logging: z.object({
    level: z.enum(LOG_LEVELS).default('INFO'),
    log_scoring_details: z.boolean().default(false),
    log_performance: z.boolean().default(true),
    log_filters: z.boolean().default(false),
  }).default({}),
});

export type RawRankingConfig = z.input<typeof RawRankingConfigSchema>;
type ParsedRawRankingConfig = z.output<typeof RawRankingConfigSchema>;

// ============================================================================
// RANKING CONFIG (CONSUMED BY THE RANKER)
// ============================================================================

export type FilterTarget = 'low' | 'high' | number;

export interface FactorWeights {
  readonly semanticSimilarity: number;
  readonly dimensionAlignment: number;
  readonly recencyScore: number;
  readonly confidenceScore: number;
}

export interface ProfileDefinition {
  readonly id: string;
  readonly description?: string;
  readonly targetUsers: readonly string[];
  readonly weights: FactorWeights;
  /** Dimension name -> multiplier, in declaration order. */
  readonly dimensions: Readonly<Record<string, number>>;
}

export interface FilterConstraintTemplate {
  readonly dimension: string;
  readonly target: FilterTarget;
}

export interface FilterMappingDefinition {
  readonly phrase: string;
  readonly constraints: readonly FilterConstraintTemplate[];
  readonly confidence: number;
}

export interface RetrievalSettings {
  readonly enableDimensionRanking: boolean;
  readonly defaultStrategy: RetrievalStrategy;
  readonly maxCandidatesMultiplier: number;
  readonly minCandidates: number;
  readonly maxProcessingTimeMs: number;
  readonly enableFallback: boolean;
  readonly fallbackStrategy: FallbackStrategy;
  readonly scoringConcurrency: number;
  readonly externalCallTimeoutMs: number;
}

export interface AdaptiveSettings {
  readonly timeoutThreshold: number;
  readonly cooldownQueries: number;
}

export interface FilterSettings {
  readonly enableParsing: boolean;
  readonly confidenceThreshold: number;
  readonly filterStrength: number;
  readonly highThreshold: number;
  readonly lowThreshold: number;
  readonly mappings: readonly FilterMappingDefinition[];
}

export interface DetectionSettings {
  readonly enable: boolean;
  readonly confidenceThreshold: number;
  /** Profile id -> regex sources, in declaration order. */
  readonly patterns: Readonly<Record<string, readonly string[]>>;
}

export interface AlignmentSettings {
  readonly method: AlignmentMethod;
  readonly normalization: NormalizationMode;
  readonly confidenceBoost: {
    readonly enable: boolean;
    readonly maxBoost: number;
    readonly threshold: number;
  };
  readonly profileBonus: {
    readonly enable: boolean;
    readonly sameProfileBonus: number;
    readonly crossProfilePenalty: number;
  };
}

export interface CacheSettings {
  readonly enableDimensionCache: boolean;
  readonly cacheSize: number;
  readonly cacheTtlMs: number;
  readonly enableQueryCache: boolean;
  readonly queryCacheSize: number;
}

export interface LoggingSettings {
  readonly level: (typeof LOG_LEVELS)[number];
  readonly logScoringDetails: boolean;
  readonly logPerformance: boolean;
  readonly logFilters: boolean;
}

export interface RankingConfig {
  readonly retrieval: RetrievalSettings;
  readonly adaptive: AdaptiveSettings;
  /** Profiles in declaration order; order is the detection tie-break. */
  readonly profiles: readonly ProfileDefinition[];
  readonly filters: FilterSettings;
  readonly detection: DetectionSettings;
  readonly alignment: AlignmentSettings;
  readonly caching: CacheSettings;
  readonly logging: LoggingSettings;
}

// ============================================================================
// MAPPING
// ============================================================================

type RawFilterMapping = z.output<typeof RawFilterMappingSchema>;

interface DetailedRawFilterMapping {
  constraints: Record<string, FilterTarget>;
  confidence: number;
}

function isDetailedMapping(raw: RawFilterMapping): raw is DetailedRawFilterMapping {
  const constraints = raw.constraints;
  return typeof constraints === 'object' && constraints !== null;
}

function toFilterMapping(
  phrase: string,
  raw: RawFilterMapping,
  defaultConfidence: number
): FilterMappingDefinition {
  const targets = isDetailedMapping(raw) ? raw.constraints : raw;
  const confidence = isDetailedMapping(raw) ? raw.confidence : defaultConfidence;
  return {
    phrase,
    constraints: Object.entries(targets).map(([dimension, target]) => ({ dimension, target })),
    confidence,
  };
}

export function toRankingConfig(raw: ParsedRawRankingConfig): RankingConfig {
  const filters = raw.natural_language_filters;
  const alignment = raw.dimension_alignment;

  const config: RankingConfig = {
    retrieval: {
      enableDimensionRanking: raw.retrieval.enable_dimension_ranking,
      defaultStrategy: raw.retrieval.default_strategy,
      maxCandidatesMultiplier: raw.retrieval.max_candidates_multiplier,
      minCandidates: raw.retrieval.min_candidates,
      maxProcessingTimeMs: raw.retrieval.max_processing_time_ms,
      enableFallback: raw.retrieval.enable_fallback,
      fallbackStrategy: raw.retrieval.fallback_strategy,
      scoringConcurrency: raw.retrieval.scoring_concurrency,
      externalCallTimeoutMs: raw.retrieval.external_call_timeout_ms,
    },
    adaptive: {
      timeoutThreshold: raw.adaptive.timeout_threshold,
      cooldownQueries: raw.adaptive.cooldown_queries,
    },
    profiles: Object.entries(raw.profiles).map(([id, profile]) => ({
      id,
      description: profile.description,
      targetUsers: profile.target_users,
      weights: {
        semanticSimilarity: profile.weights.semantic_similarity,
        dimensionAlignment: profile.weights.dimension_alignment,
        recencyScore: profile.weights.recency_score,
        confidenceScore: profile.weights.confidence_score,
      },
      dimensions: { ...profile.dimensions },
    })),
    filters: {
      enableParsing: filters.enable_parsing,
      confidenceThreshold: filters.confidence_threshold,
      filterStrength: filters.filter_strength,
      highThreshold: filters.high_threshold,
      lowThreshold: filters.low_threshold,
      mappings: Object.entries(filters.filter_mappings).map(([phrase, mapping]) =>
        toFilterMapping(phrase, mapping, filters.default_phrase_confidence)
      ),
    },
    detection: {
      enable: raw.auto_profile_detection.enable,
      confidenceThreshold: raw.auto_profile_detection.confidence_threshold,
      patterns: { ...raw.auto_profile_detection.patterns },
    },
    alignment: {
      method: alignment.alignment_method,
      normalization: alignment.normalization,
      confidenceBoost: {
        enable: alignment.confidence_boost.enable,
        maxBoost: alignment.confidence_boost.max_boost,
        threshold: alignment.confidence_boost.threshold,
      },
      profileBonus: {
        enable: alignment.profile_bonus.enable,
        sameProfileBonus: alignment.profile_bonus.same_profile_bonus,
        crossProfilePenalty: alignment.profile_bonus.cross_profile_penalty,
      },
    },
    caching: {
      enableDimensionCache: raw.caching.enable_dimension_cache,
      cacheSize: raw.caching.cache_size,
      cacheTtlMs: raw.caching.cache_ttl * 1000,
      enableQueryCache: raw.caching.enable_query_cache,
      queryCacheSize: raw.caching.query_cache_size,
    },
    logging: {
      level: raw.logging.level,
      logScoringDetails: raw.logging.log_scoring_details,
      logPerformance: raw.logging.log_performance,
      logFilters: raw.logging.log_filters,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
