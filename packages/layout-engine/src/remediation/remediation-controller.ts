import type { LoggerMethods } from '@glyphorder/logger';
import type {
  QualityScore,
  RemediationAttempt,
  RemediationState,
  VerificationReport,
} from '@glyphorder/model';

import type { ExtractionConfig, ParameterSet } from '../config/extraction-config';

import { checkAborted } from '@glyphorder/shared';

import {
  DEFAULT_PARAMETER_SETS,
  applyParameterSet,
} from '../config/extraction-config';
import { ExtractionError } from '../errors/extraction-error';

/**
 * What an attempt must report for the controller to judge it.
 */
export interface ScoredRun {
  readonly quality: QualityScore;
  readonly verification: VerificationReport;
}

export interface RemediationOutcome<T extends ScoredRun> {
  readonly state: RemediationState;
  readonly best: T;

  /** 1-based number of the attempt `best` came from */
  readonly chosenAttempt: number;
  readonly attempts: readonly RemediationAttempt[];
}

/**
 * Re-runs extraction with alternate parameter sets until an attempt meets
 * both the quality and the coverage threshold.
 *
 * Attempts stop at `maxAttempts` or when the parameter sets run out; the
 * best-scoring attempt is kept, the earliest one on a tie. Cancellation
 * between attempts returns the best attempt so far.
 */
export class RemediationController {
  private readonly logger: LoggerMethods;
  private readonly config: ExtractionConfig;
  private readonly parameterSets: readonly ParameterSet[];

  constructor(
    logger: LoggerMethods,
    config: ExtractionConfig,
    parameterSets: readonly ParameterSet[] = DEFAULT_PARAMETER_SETS,
  ) {
    this.logger = logger;
    this.config = config;
    this.parameterSets = parameterSets;
  }

  /**
   * @throws AbortError when cancelled before the first attempt completes
   */
  execute<T extends ScoredRun>(
    run: (config: ExtractionConfig, set: ParameterSet) => T,
    abortSignal?: AbortSignal,
  ): RemediationOutcome<T> {
    const sets = this.parameterSets.slice(0, this.config.maxAttempts);
    const attempts: RemediationAttempt[] = [];
    let best: { run: T; attempt: number } | undefined;

    for (const [i, set] of sets.entries()) {
      if (best && abortSignal?.aborted) {
        this.logger.warn(
          `[RemediationController] Cancelled after ${attempts.length} attempt(s)`,
        );
        return this.outcome('cancelled', best, attempts);
      }
      checkAborted(abortSignal);

      const attempt = i + 1;
      const result = run(applyParameterSet(this.config, set), set);
      attempts.push({
        attempt,
        label: set.label,
        score: result.quality.score,
        grade: result.quality.grade,
        coverage: result.verification.coverage,
      });
      this.logger.info(
        `[RemediationController] Attempt ${attempt} (${set.label}): score ${result.quality.score}, coverage ${result.verification.coverage.toFixed(3)}`,
      );

      if (!best || result.quality.score > best.run.quality.score) {
        best = { run: result, attempt };
      }
      if (this.isAcceptable(result)) {
        return this.outcome('accepted', { run: result, attempt }, attempts);
      }
    }

    if (!best) {
      throw new ExtractionError('No remediation parameter set to run');
    }
    this.logger.warn(
      `[RemediationController] No attempt met the thresholds; keeping attempt ${best.attempt} (score ${best.run.quality.score})`,
    );
    return this.outcome('exhausted', best, attempts);
  }

  private isAcceptable(run: ScoredRun): boolean {
    return (
      run.quality.score >= this.config.qualityThreshold &&
      run.verification.coverage >= this.config.coverageThreshold
    );
  }

  private outcome<T extends ScoredRun>(
    state: RemediationState,
    best: { run: T; attempt: number },
    attempts: readonly RemediationAttempt[],
  ): RemediationOutcome<T> {
    return {
      state,
      best: best.run,
      chosenAttempt: best.attempt,
      attempts,
    };
  }
}
