import type {
  QualityGrade,
  QualityScore,
  VerificationReport,
} from '@glyphorder/model';

import { QUALITY } from '../config/constants';

/**
 * Weighted 0-100 score of one extraction attempt.
 *
 * Components: coverage, share of pages without hallucination flags
 * (saturating at one flag per page), footnote match rate, table match rate
 * and reading-order consistency.
 */
export class QualityScorer {
  static score(verification: VerificationReport, pageCount: number): QualityScore {
    const hallucinations = verification.flags.filter(
      (flag) => flag.type === 'hallucination',
    ).length;

    const components = {
      coverage: verification.coverage,
      hallucination:
        1 - Math.min(1, hallucinations / Math.max(1, pageCount)),
      footnotes: verification.footnoteMatchRate,
      tables: verification.tableMatchRate,
      ordering: verification.orderingConsistent ? 1 : 0,
    };

    const { WEIGHTS } = QUALITY;
    const weighted =
      WEIGHTS.coverage * components.coverage +
      WEIGHTS.hallucination * components.hallucination +
      WEIGHTS.footnotes * components.footnotes +
      WEIGHTS.tables * components.tables +
      WEIGHTS.ordering * components.ordering;
    const score = Math.round(weighted * 1000) / 10;

    return { score, grade: QualityScorer.grade(score), components };
  }

  static grade(score: number): QualityGrade {
    return QUALITY.GRADES.find((entry) => score >= entry.min)?.grade ?? 'F';
  }
}
