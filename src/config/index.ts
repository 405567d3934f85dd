/**
 * @fileoverview Ranking configuration
 */

export {
  RawRankingConfigSchema,
  toRankingConfig,
  RETRIEVAL_STRATEGIES,
  FALLBACK_STRATEGIES,
  ALIGNMENT_METHODS,
  NORMALIZATION_MODES,
  LOG_LEVELS,
  type RawRankingConfig,
  type RankingConfig,
  type RetrievalStrategy,
  type FallbackStrategy,
  type AlignmentMethod,
  type NormalizationMode,
  type FilterTarget,
  type FactorWeights,
  type ProfileDefinition,
  type FilterConstraintTemplate,
  type FilterMappingDefinition,
  type RetrievalSettings,
  type AdaptiveSettings,
  type FilterSettings,
  type DetectionSettings,
  type AlignmentSettings,
  type CacheSettings,
  type LoggingSettings,
} from './schema.js';

export {
  DEFAULT_CONFIG_FILE,
  parseRankingConfig,
  parseRankingConfigYaml,
  loadRankingConfig,
  loadDefaultRankingConfig,
  resolveDefaultConfigPath,
} from './loader.js';
