/**
 * @fileoverview Composite ranker
 *
 * Re-ranks vector-search candidates by blending four factors with the active
 * profile's weights:
 *
 *   composite = sim x w.semanticSimilarity + align x w.dimensionAlignment
 *             + recency x w.recencyScore + confidence x w.confidenceScore
 *
 * Each call walks INIT -> PROFILE_RESOLVED -> CANDIDATES_FETCHED -> SCORED ->
 * RANKED -> DONE. FALLBACK replaces everything after INIT when dimension
 * ranking is off or the fallback controller says vector_only. TIMEOUT replaces
 * SCORED when the processing budget runs out: candidates already scored keep
 * their scores, the rest rank on similarity alone, and the call still
 * succeeds with `degraded: true`. A candidate whose store reads fail ranks on
 * similarity the same way and marks the call `scoring_error`.
 */

import { loadDefaultRankingConfig } from '../config/loader.js';
import type { RankingConfig, FactorWeights } from '../config/schema.js';
import { Errors, isCacheUnavailableError, isRankerError, type RankerError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import {
  ProfileRegistryHandle,
  type Profile,
  type ProfileRegistry,
  type ProfileRegistrySource,
} from '../profiles/registry.js';
import { ScoreCache, type ScoreCacheOptions, type ScoreCacheStats } from '../storage/score_cache.js';
import { logDebug, logInfo, logWarning, parseLogLevel, setLogLevel } from '../telemetry/logger.js';
import type {
  CandidateHit,
  ChunkStore,
  DegradationReason,
  ExecutionMode,
  FactorScores,
  FilterConstraint,
  ProfileSource,
  RankingFactor,
  RankingResponse,
  RankingState,
  ScoredCandidate,
  SimilarityIndex,
} from '../types.js';
import { RANKING_FACTORS } from '../types.js';
import { mapWithConcurrency, startDeadline, withTimeout } from '../utils/async.js';
import { toError } from '../utils/errors.js';
import { clamp01 } from '../utils/math.js';
import { AlignmentCalculator, findBestMatchingProfile } from './alignment.js';
import {
  FallbackController,
  type AdaptiveState,
  type CallOutcome,
  type FallbackDecision,
} from './fallback_controller.js';
import { FilterParser, type PhraseMatch } from './filter_parser.js';
import { computeQueryFingerprint, embeddingCacheKey } from './fingerprint.js';
import { ProfileDetector, type ProfileDetection } from './profile_detector.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CompositeRankerOptions {
  config: RankingConfig;
  index: SimilarityIndex;
  store: ChunkStore;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
  cache?: Omit<ScoreCacheOptions, 'now'>;
}

export interface QueryPreview {
  readonly profile: ProfileDetection;
  readonly profileUsed: string;
  readonly profileSource: ProfileSource;
  readonly phrases: readonly PhraseMatch[];
  readonly constraints: readonly FilterConstraint[];
}

export interface RankerStats {
  readonly queries: number;
  readonly failures: number;
  readonly degraded: Readonly<Record<DegradationReason, number>>;
  readonly adaptive: AdaptiveState;
  readonly registryVersion: number;
}

interface ResolvedProfile {
  readonly profile: Profile;
  readonly source: ProfileSource;
  readonly confidence: number;
  readonly detection?: ProfileDetection;
}

interface CandidateScore {
  readonly factors: FactorScores;
  readonly cacheHit: boolean;
}

interface ScoringProgress {
  timedOut: boolean;
  failed: number;
}

interface QueryRun {
  readonly queryText: string;
  readonly resultCount: number;
  readonly registry: ProfileRegistry;
  readonly startedAt: number;
  readonly states: RankingState[];
  cacheBypassed: boolean;
}

// ============================================================================
// HELPERS
// ============================================================================

const FACTOR_LABELS: Record<RankingFactor, string> = {
  semanticSimilarity: 'semantic_similarity',
  dimensionAlignment: 'dimension_alignment',
  recencyScore: 'recency_score',
  confidenceScore: 'confidence_score',
};

/**
 * Profile weights without the semantic factor, renormalized to sum to 1.
 * Falls back to alignment alone when the remaining weights are all zero.
 */
export function dimensionOnlyWeights(weights: FactorWeights): FactorWeights {
  const remaining = weights.dimensionAlignment + weights.recencyScore + weights.confidenceScore;
  if (remaining <= 0) {
    return { semanticSimilarity: 0, dimensionAlignment: 1, recencyScore: 0, confidenceScore: 0 };
  }
  return {
    semanticSimilarity: 0,
    dimensionAlignment: weights.dimensionAlignment / remaining,
    recencyScore: weights.recencyScore / remaining,
    confidenceScore: weights.confidenceScore / remaining,
  };
}

export function compositeScore(factors: FactorScores, weights: FactorWeights): number {
  let total = 0;
  for (const factor of RANKING_FACTORS) {
    total += factors[factor] * weights[factor];
  }
  return total;
}

function explain(factors: FactorScores, weights: FactorWeights): string {
  const top = RANKING_FACTORS
    .map((factor) => ({ factor, contribution: factors[factor] * weights[factor], score: factors[factor] }))
    .filter((entry) => entry.contribution > 0)
    .sort((a, b) => b.contribution - a.contribution)
    .slice(0, 3)
    .map((entry) => `${FACTOR_LABELS[entry.factor]}: ${Math.round(entry.score * 100)}%`);
  return top.length > 0 ? `Top factors: ${top.join(', ')}` : 'No contributing factors';
}

function outcomeOf(response: RankingResponse): CallOutcome {
  if (response.degradation === 'timeout') return 'timeout';
  if (response.degradation === 'scoring_error') return 'failed';
  return 'completed';
}

function similarityOnlyFactors(hit: CandidateHit): FactorScores {
  return {
    semanticSimilarity: clamp01(hit.similarity),
    dimensionAlignment: 0,
    recencyScore: 0,
    confidenceScore: 0,
  };
}

// ============================================================================
// RANKER
// ============================================================================

export class CompositeRanker {
  private readonly config: RankingConfig;
  private readonly index: SimilarityIndex;
  private readonly store: ChunkStore;
  private readonly now: () => number;
  private readonly registry: ProfileRegistryHandle;
  private readonly filterParser: FilterParser;
  private readonly alignment: AlignmentCalculator;
  private readonly cache: ScoreCache;
  private readonly fallback: FallbackController;
  private detector: ProfileDetector;

  private queries = 0;
  private failures = 0;
  private readonly degradedCounts: Record<DegradationReason, number> = {
    dimension_ranking_disabled: 0,
    vector_only_strategy: 0,
    adaptive_downgrade: 0,
    timeout: 0,
    scoring_error: 0,
  };

  /**
   * @throws ConfigurationError when the profiles in `config` do not validate
   */
  constructor(options: CompositeRankerOptions) {
    this.config = options.config;
    this.index = options.index;
    this.store = options.store;
    this.now = options.now ?? Date.now;
    this.registry = new ProfileRegistryHandle(options.config);
    this.filterParser = new FilterParser(options.config.filters);
    this.detector = new ProfileDetector(options.config.detection);
    this.alignment = new AlignmentCalculator(options.config.alignment, options.config.filters);
    this.cache = new ScoreCache(options.config.caching, { ...options.cache, now: this.now });
    this.fallback = new FallbackController(options.config.retrieval, options.config.adaptive);
  }

  // ==========================================================================
  // RANK
  // ==========================================================================

  /**
   * Rank candidates for a query.
   *
   * @param profileOverride - Use this profile instead of detecting one. An
   *   unknown id falls back to the default profile with a warning.
   * @throws InvalidRequestError for an empty query or a non-positive count
   * @throws CandidateFetchError when the similarity index fails
   */
  async rank(queryText: string, resultCount: number, profileOverride?: string): Promise<RankingResponse> {
    this.validateRequest(queryText, resultCount);
    this.queries++;

    const run: QueryRun = {
      queryText,
      resultCount,
      registry: this.registry.snapshot,
      startedAt: this.now(),
      states: ['INIT'],
      cacheBypassed: false,
    };

    const decision = this.fallback.decide();
    try {
      const response = decision.mode === 'vector_only'
        ? await this.rankVectorOnly(run, decision, profileOverride)
        : await this.rankHybrid(run, decision, profileOverride);
      this.fallback.record(decision, outcomeOf(response));
      if (response.degradation) this.degradedCounts[response.degradation]++;
      this.logCompletion(run, response);
      return response;
    } catch (error) {
      this.failures++;
      this.fallback.record(decision, 'failed');
      throw error;
    }
  }

  private async rankHybrid(
    run: QueryRun,
    decision: FallbackDecision,
    profileOverride: string | undefined
  ): Promise<RankingResponse> {
    const resolved = this.resolveProfile(run.queryText, run.registry, profileOverride);
    run.states.push('PROFILE_RESOLVED');

    const constraints = this.filterParser.parse(run.queryText);
    if (this.config.logging.logFilters) {
      logInfo('[ranker] filter constraints', {
        query: run.queryText,
        phrases: this.filterParser.matchPhrases(run.queryText),
        constraints,
      });
    }

    const candidateCount = Math.max(
      this.config.retrieval.minCandidates,
      run.resultCount * this.config.retrieval.maxCandidatesMultiplier
    );
    const hits = await this.fetchCandidates(run, candidateCount);
    const fetchedAt = this.now();
    run.states.push('CANDIDATES_FETCHED');

    const fingerprint = computeQueryFingerprint(run.queryText, run.registry.version);
    const budgetMs = this.config.retrieval.maxProcessingTimeMs;
    const progress: ScoringProgress = { timedOut: false, failed: 0 };
    const outcomes = new Array<Result<CandidateScore, RankerError> | undefined>(hits.length).fill(undefined);

    // The budget is enforced twice: the injected clock is checked before each
    // candidate is handed out, and a wall-clock timer cuts off candidates
    // still in flight. Outcomes landing after the cut-off are discarded.
    const shouldContinue = (): boolean => {
      if (progress.timedOut) return false;
      if (this.now() - fetchedAt > budgetMs) {
        progress.timedOut = true;
        return false;
      }
      return true;
    };

    const deadline = startDeadline(budgetMs);
    const pool = mapWithConcurrency(
      hits,
      this.config.retrieval.scoringConcurrency,
      async (hit, position) => {
        const outcome = await this.scoreCandidate(run, hit, resolved.profile, constraints, fingerprint);
        if (progress.timedOut) return;
        outcomes[position] = outcome;
        if (!outcome.ok) {
          progress.failed++;
          logWarning('[ranker] candidate could not be scored; ranking it on similarity', {
            chunkId: hit.chunkId,
            error: outcome.error.toJSON(),
          });
        }
      },
      shouldContinue
    );

    try {
      await Promise.race([
        pool,
        deadline.expired.then(() => {
          progress.timedOut = true;
        }),
      ]);
    } finally {
      deadline.cancel();
    }
    const scoredAt = this.now();

    const scored = outcomes.filter((outcome) => outcome !== undefined && outcome.ok).length;
    const timedOut = progress.timedOut;
    run.states.push(timedOut ? 'TIMEOUT' : 'SCORED');
    if (timedOut) {
      logWarning('[ranker] processing budget exceeded; unscored candidates rank on similarity', {
        budgetMs,
        scored,
        candidates: hits.length,
      });
    }
    const degradation: DegradationReason | undefined = timedOut
      ? 'timeout'
      : progress.failed > 0
        ? 'scoring_error'
        : undefined;

    const mode: ExecutionMode = decision.mode === 'dimension_only' ? 'dimension_only' : 'hybrid';
    const weights = mode === 'dimension_only'
      ? dimensionOnlyWeights(resolved.profile.weights)
      : resolved.profile.weights;

    const ranked = hits
      .map((hit, similarityRank) => {
        const outcome = outcomes[similarityRank];
        const score = outcome && outcome.ok ? outcome.value : undefined;
        const factors = score?.factors ?? similarityOnlyFactors(hit);
        const candidate: ScoredCandidate = {
          chunkId: hit.chunkId,
          similarityRank,
          factors,
          compositeScore: compositeScore(factors, weights),
          profileId: resolved.profile.id,
          dimensionScored: score !== undefined,
          cacheHit: score?.cacheHit ?? false,
          explanation: explain(factors, weights),
        };
        return candidate;
      })
      .sort((a, b) => b.compositeScore - a.compositeScore || a.similarityRank - b.similarityRank)
      .slice(0, run.resultCount);
    run.states.push('RANKED', 'DONE');

    if (this.config.logging.logScoringDetails) {
      for (const candidate of ranked) {
        logDebug('[ranker] scored candidate', {
          chunkId: candidate.chunkId,
          factors: candidate.factors,
          compositeScore: candidate.compositeScore,
          cacheHit: candidate.cacheHit,
        });
      }
    }

    return this.buildResponse(run, {
      results: ranked,
      resolved,
      decision,
      mode,
      degradation,
      constraints,
      candidatesFetched: hits.length,
      candidatesScored: scored,
      fetchMs: fetchedAt - run.startedAt,
      scoringMs: scoredAt - fetchedAt,
    });
  }

  private async rankVectorOnly(
    run: QueryRun,
    decision: FallbackDecision,
    profileOverride: string | undefined
  ): Promise<RankingResponse> {
    run.states.push('FALLBACK');
    const resolved = this.resolveFallbackProfile(run.registry, profileOverride);
    const hits = await this.fetchCandidates(run, run.resultCount);
    const fetchedAt = this.now();
    const results = this.similarityOrdering(hits, run.resultCount, resolved.profile.id);
    run.states.push('DONE');

    const degradation: DegradationReason =
      decision.reason === 'dimension_ranking_disabled'
        ? 'dimension_ranking_disabled'
        : decision.reason === 'adaptive_downgrade'
          ? 'adaptive_downgrade'
          : 'vector_only_strategy';

    return this.buildResponse(run, {
      results,
      resolved,
      decision,
      mode: 'vector_only',
      degradation,
      constraints: [],
      candidatesFetched: hits.length,
      candidatesScored: 0,
      fetchMs: fetchedAt - run.startedAt,
      scoringMs: 0,
    });
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private validateRequest(queryText: string, resultCount: number): void {
    if (typeof queryText !== 'string' || queryText.trim().length === 0) {
      throw Errors.invalidRequest('queryText', 'a non-empty string', JSON.stringify(queryText));
    }
    if (!Number.isInteger(resultCount) || resultCount <= 0) {
      throw Errors.invalidRequest('resultCount', 'a positive integer', String(resultCount));
    }
  }

  private resolveProfile(
    queryText: string,
    registry: ProfileRegistry,
    profileOverride: string | undefined
  ): ResolvedProfile {
    if (profileOverride !== undefined) {
      const override = registry.get(profileOverride);
      if (override) {
        return { profile: override, source: 'override', confidence: 1 };
      }
      this.warnUnknownProfile(registry, profileOverride);
      return { profile: registry.default(), source: 'override_rejected', confidence: 0 };
    }

    const detection = this.detector.detect(queryText, registry);
    return {
      profile: registry.require(detection.profileId),
      source: detection.detected ? 'detected' : 'default',
      confidence: detection.confidence,
      detection,
    };
  }

  private resolveFallbackProfile(registry: ProfileRegistry, profileOverride: string | undefined): ResolvedProfile {
    if (profileOverride === undefined) {
      return { profile: registry.default(), source: 'default', confidence: 0 };
    }
    const override = registry.get(profileOverride);
    if (override) {
      return { profile: override, source: 'override', confidence: 1 };
    }
    this.warnUnknownProfile(registry, profileOverride);
    return { profile: registry.default(), source: 'override_rejected', confidence: 0 };
  }

  private warnUnknownProfile(registry: ProfileRegistry, profileId: string): void {
    const error = Errors.unknownProfile(profileId, registry.ids());
    logWarning('[ranker] unknown profile override; using default profile', {
      profileId,
      defaultProfile: registry.default().id,
      error: error.toJSON(),
    });
  }

  private async fetchCandidates(run: QueryRun, count: number): Promise<CandidateHit[]> {
    const timeoutMs = this.config.retrieval.externalCallTimeoutMs;
    const embedding = await this.embedQuery(run, timeoutMs);

    try {
      const hits = await withTimeout(this.index.fetchCandidates(embedding, count), timeoutMs, {
        context: 'fetching candidates',
      });
      return hits.slice(0, count);
    } catch (error) {
      const cause = toError(error);
      throw Errors.candidateFetch('fetch', cause.message, true, cause);
    }
  }

  private async embedQuery(run: QueryRun, timeoutMs: number): Promise<readonly number[]> {
    const key = embeddingCacheKey(run.queryText);
    const cached = this.withCache(run, () => this.cache.getEmbedding(key));
    if (cached) return cached;

    let embedding: number[];
    try {
      embedding = await withTimeout(this.index.embed(run.queryText), timeoutMs, { context: 'embedding query' });
    } catch (error) {
      const cause = toError(error);
      throw Errors.candidateFetch('embed', cause.message, true, cause);
    }

    this.withCache(run, () => this.cache.setEmbedding(key, embedding));
    return embedding;
  }

  private async scoreCandidate(
    run: QueryRun,
    hit: CandidateHit,
    profile: Profile,
    constraints: readonly FilterConstraint[],
    fingerprint: string
  ): Promise<Result<CandidateScore, RankerError>> {
    const timeoutMs = this.config.retrieval.externalCallTimeoutMs;
    const cacheKey = { fingerprint, chunkId: hit.chunkId, profileId: profile.id };

    try {
      const cachedAlignment = this.withCache(run, () => this.cache.getAlignment(cacheKey));

      const [recency, confidence, alignment] = await Promise.all([
        withTimeout(this.store.getRecency(hit.chunkId), timeoutMs, { context: `recency of ${hit.chunkId}` }),
        withTimeout(this.store.getConfidence(hit.chunkId), timeoutMs, { context: `confidence of ${hit.chunkId}` }),
        cachedAlignment !== undefined
          ? Promise.resolve(cachedAlignment)
          : this.computeAlignment(run, hit, profile, constraints, timeoutMs),
      ]);

      if (cachedAlignment === undefined) {
        this.withCache(run, () => this.cache.setAlignment(cacheKey, alignment));
      }

      return Ok({
        factors: {
          semanticSimilarity: clamp01(hit.similarity),
          dimensionAlignment: alignment,
          recencyScore: clamp01(recency),
          confidenceScore: clamp01(confidence),
        },
        cacheHit: cachedAlignment !== undefined,
      });
    } catch (error) {
      if (isRankerError(error)) return Err(error);
      const cause = toError(error);
      return Err(Errors.scoring(hit.chunkId, cause.message, true, cause));
    }
  }

  private async computeAlignment(
    run: QueryRun,
    hit: CandidateHit,
    profile: Profile,
    constraints: readonly FilterConstraint[],
    timeoutMs: number
  ): Promise<number> {
    const [dimensionScores, hint] = await Promise.all([
      withTimeout(this.store.getDimensionScores(hit.chunkId), timeoutMs, {
        context: `dimension scores of ${hit.chunkId}`,
      }),
      this.store.getProfileHint
        ? withTimeout(this.store.getProfileHint(hit.chunkId), timeoutMs, { context: `profile of ${hit.chunkId}` })
        : Promise.resolve(undefined),
    ]);

    const chunkProfileId = hint ?? findBestMatchingProfile(dimensionScores, run.registry.list());
    return this.alignment.calculate({ dimensionScores, profile, constraints, chunkProfileId }).alignment;
  }

  /**
   * Run a cache operation; on CacheUnavailableError switch this call to
   * no-cache mode and carry on without the cached value.
   */
  private withCache<T>(run: QueryRun, operation: () => T): T | undefined {
    if (run.cacheBypassed) return undefined;
    try {
      return operation();
    } catch (error) {
      if (!isCacheUnavailableError(error)) throw error;
      run.cacheBypassed = true;
      logWarning('[ranker] cache unavailable; recomputing scores for this query', {
        error: error.toJSON(),
      });
      return undefined;
    }
  }

  private similarityOrdering(hits: readonly CandidateHit[], resultCount: number, profileId: string): ScoredCandidate[] {
    const weights: FactorWeights = { semanticSimilarity: 1, dimensionAlignment: 0, recencyScore: 0, confidenceScore: 0 };
    return hits
      .map((hit, similarityRank) => {
        const factors = similarityOnlyFactors(hit);
        return {
          chunkId: hit.chunkId,
          similarityRank,
          factors,
          compositeScore: factors.semanticSimilarity,
          profileId,
          dimensionScored: false,
          cacheHit: false,
          explanation: explain(factors, weights),
        };
      })
      .sort((a, b) => b.compositeScore - a.compositeScore || a.similarityRank - b.similarityRank)
      .slice(0, resultCount);
  }

  private buildResponse(
    run: QueryRun,
    parts: {
      results: ScoredCandidate[];
      resolved: ResolvedProfile;
      decision: FallbackDecision;
      mode: ExecutionMode;
      degradation: DegradationReason | undefined;
      constraints: readonly FilterConstraint[];
      candidatesFetched: number;
      candidatesScored: number;
      fetchMs: number;
      scoringMs: number;
    }
  ): RankingResponse {
    return {
      results: parts.results,
      profileUsed: parts.resolved.profile.id,
      profileSource: parts.resolved.source,
      profileConfidence: parts.resolved.confidence,
      degraded: parts.degradation !== undefined,
      degradation: parts.degradation,
      strategy: parts.decision.strategy,
      mode: parts.mode,
      constraints: parts.constraints,
      candidatesFetched: parts.candidatesFetched,
      candidatesScored: parts.candidatesScored,
      states: [...run.states],
      cacheBypassed: run.cacheBypassed,
      timings: {
        totalMs: this.now() - run.startedAt,
        fetchMs: parts.fetchMs,
        scoringMs: parts.scoringMs,
      },
    };
  }

  private logCompletion(run: QueryRun, response: RankingResponse): void {
    if (!this.config.logging.logPerformance) return;
    logInfo('[ranker] query ranked', {
      profile: response.profileUsed,
      mode: response.mode,
      results: response.results.length,
      candidates: response.candidatesFetched,
      scored: response.candidatesScored,
      degraded: response.degradation ?? false,
      totalMs: response.timings.totalMs,
      scoringMs: response.timings.scoringMs,
      cacheBypassed: run.cacheBypassed,
    });
  }

  // ==========================================================================
  // INTROSPECTION & ADMINISTRATION
  // ==========================================================================

  /**
   * The profile and constraints a query would run with, without fetching
   * candidates.
   */
  previewQuery(queryText: string, profileOverride?: string): QueryPreview {
    const registry = this.registry.snapshot;
    const resolved = this.resolveProfile(queryText, registry, profileOverride);
    return {
      profile: resolved.detection ?? this.detector.detect(queryText, registry),
      profileUsed: resolved.profile.id,
      profileSource: resolved.source,
      phrases: this.filterParser.matchPhrases(queryText),
      constraints: this.filterParser.parse(queryText),
    };
  }

  /**
   * Install a new profile set. Queries already running finish on the
   * snapshot they started with.
   *
   * @throws ConfigurationError; the current profiles stay installed
   */
  reloadProfiles(source: ProfileRegistrySource & Pick<RankingConfig, 'detection'>): ProfileRegistry {
    const next = this.registry.reload(source);
    this.detector = new ProfileDetector(source.detection);
    logInfo('[ranker] profiles reloaded', { version: next.version, profiles: next.ids() });
    return next;
  }

  get profiles(): ProfileRegistry {
    return this.registry.snapshot;
  }

  /**
   * @returns Number of entries dropped
   * @throws CacheUnavailableError
   */
  clearCaches(): number {
    const cleared = this.cache.clear();
    logInfo('[ranker] caches cleared', { entries: cleared });
    return cleared;
  }

  getCacheStats(): ScoreCacheStats {
    return this.cache.getStats();
  }

  getStats(): RankerStats {
    return {
      queries: this.queries,
      failures: this.failures,
      degraded: { ...this.degradedCounts },
      adaptive: this.fallback.getState(),
      registryVersion: this.registry.snapshot.version,
    };
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface CreateCompositeRankerOptions extends Omit<CompositeRankerOptions, 'config'> {
  /** Defaults to the bundled dimension_ranking.yaml */
  config?: RankingConfig;
}

/**
 * Build a ranker and apply its logging level.
 *
 * @throws ConfigurationError when the configuration does not validate
 */
export async function createCompositeRanker(options: CreateCompositeRankerOptions): Promise<CompositeRanker> {
  const config = options.config ?? await loadDefaultRankingConfig();
  setLogLevel(parseLogLevel(config.logging.level));
  return new CompositeRanker({ ...options, config });
}
