export type QualityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

/**
 * Composite quality of one extraction attempt.
 */
export interface QualityScore {
  /** 0-100, one decimal */
  readonly score: number;
  readonly grade: QualityGrade;

  /** Component values in [0,1] before weighting */
  readonly components: {
    readonly coverage: number;
    readonly hallucination: number;
    readonly footnotes: number;
    readonly tables: number;
    readonly ordering: number;
  };
}
