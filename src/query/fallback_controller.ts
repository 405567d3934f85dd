/**
 * @fileoverview Fallback control
 *
 * Decides, per call, whether the ranker runs the hybrid pipeline or degrades.
 *
 * The adaptive strategy runs hybrid until `timeoutThreshold` consecutive
 * hybrid calls time out, then serves `cooldownQueries` calls with the
 * fallback strategy. The next call after the cooldown is a probe: if it times
 * out the controller downgrades again immediately, if it completes the
 * controller is back to normal.
 */

import type { AdaptiveSettings, RetrievalSettings, RetrievalStrategy } from '../config/schema.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type { ExecutionMode } from '../types.js';

export type DecisionReason =
  | 'configured'
  | 'dimension_ranking_disabled'
  | 'adaptive_downgrade'
  | 'adaptive_probe';

export interface FallbackDecision {
  readonly strategy: RetrievalStrategy;
  readonly mode: ExecutionMode;
  readonly reason: DecisionReason;
}

export type CallOutcome = 'completed' | 'timeout' | 'failed';

export interface AdaptiveState {
  readonly consecutiveTimeouts: number;
  readonly cooldownRemaining: number;
  readonly probing: boolean;
  readonly downgrades: number;
}

export class FallbackController {
  private consecutiveTimeouts = 0;
  private cooldownRemaining = 0;
  private probing = false;
  private downgrades = 0;

  constructor(
    private readonly retrieval: RetrievalSettings,
    private readonly adaptive: AdaptiveSettings,
  ) {}

  decide(): FallbackDecision {
    const strategy = this.retrieval.defaultStrategy;

    if (!this.retrieval.enableDimensionRanking) {
      return { strategy, mode: 'vector_only', reason: 'dimension_ranking_disabled' };
    }

    switch (strategy) {
      case 'vector_only':
      case 'dimension_only':
      case 'hybrid':
        return { strategy, mode: strategy, reason: 'configured' };
      case 'adaptive':
        return this.decideAdaptive();
    }
  }

  /**
   * Feed back how a call went. Only hybrid calls made under the adaptive
   * strategy move the controller.
   */
  record(decision: FallbackDecision, outcome: CallOutcome): void {
    if (decision.strategy !== 'adaptive' || decision.mode !== 'hybrid') return;

    if (outcome === 'completed') {
      if (this.probing) {
        logInfo('[ranker] adaptive probe completed within budget; hybrid ranking restored');
      }
      this.consecutiveTimeouts = 0;
      this.probing = false;
      return;
    }

    if (outcome !== 'timeout') return;

    this.consecutiveTimeouts++;
    if (this.probing || this.consecutiveTimeouts >= this.adaptive.timeoutThreshold) {
      this.downgrade();
    }
  }

  getState(): AdaptiveState {
    return {
      consecutiveTimeouts: this.consecutiveTimeouts,
      cooldownRemaining: this.cooldownRemaining,
      probing: this.probing,
      downgrades: this.downgrades,
    };
  }

  private decideAdaptive(): FallbackDecision {
    if (this.cooldownRemaining > 0) {
      this.cooldownRemaining--;
      if (this.cooldownRemaining === 0) this.probing = true;
      return { strategy: 'adaptive', mode: this.retrieval.fallbackStrategy, reason: 'adaptive_downgrade' };
    }
    return {
      strategy: 'adaptive',
      mode: 'hybrid',
      reason: this.probing ? 'adaptive_probe' : 'configured',
    };
  }

  private downgrade(): void {
    if (!this.retrieval.enableFallback) {
      // nowhere to degrade to; keep running hybrid with per-call timeouts
      this.consecutiveTimeouts = 0;
      this.probing = false;
      return;
    }
    logWarning('[ranker] adaptive strategy downgrading after repeated timeouts', {
      consecutiveTimeouts: this.consecutiveTimeouts,
      fallbackStrategy: this.retrieval.fallbackStrategy,
      cooldownQueries: this.adaptive.cooldownQueries,
    });
    this.consecutiveTimeouts = 0;
    this.probing = false;
    this.cooldownRemaining = this.adaptive.cooldownQueries;
    this.downgrades++;
  }
}
