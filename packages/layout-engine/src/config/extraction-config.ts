import { z } from 'zod';

import { InvalidConfigError } from '../errors/extraction-error';

const ratio = () => z.number().min(0).max(1);

/**
 * Every tunable threshold of the pipeline, with defaults.
 *
 * Distances are in page units (pt), ratios are fractions of the page or of a
 * font size.
 */
export const extractionConfigSchema = z
  .object({
    columnGap: z
      .number()
      .positive()
      .default(50)
      .describe('Minimum horizontal gap separating two columns'),
    minColumnTokens: z
      .number()
      .int()
      .min(1)
      .default(3)
      .describe('Columns with fewer tokens are merged into a neighbour'),
    lineOverlapRatio: ratio()
      .default(0.3)
      .describe('Minimum vertical overlap ratio for a token to join a band'),
    wordGapRatio: z
      .number()
      .nonnegative()
      .default(0.2)
      .describe('Gap / font size above which joined tokens get a space'),

    headerFooterZone: z
      .number()
      .min(0)
      .max(0.5)
      .default(0.12)
      .describe('Top and bottom page fraction scanned for repeating lines'),
    repeatThreshold: ratio()
      .default(0.5)
      .describe('Page fraction a repeating line must exceed'),
    positionPrecision: z
      .number()
      .positive()
      .default(0.02)
      .describe('Quantisation step of normalized line positions'),

    marginFiltering: z
      .boolean()
      .default(true)
      .describe('Remove margin page numbers and repeating headers/footers'),
    marginRatio: z
      .number()
      .min(0)
      .max(0.5)
      .default(0.05)
      .describe('Outer page fraction treated as margin'),
    proximityRadius: z
      .number()
      .nonnegative()
      .default(50)
      .describe('Neighbourhood radius for isolated-token checks'),

    scriptSizeRatio: ratio()
      .default(0.7)
      .describe('Font size ratio below which a token may be a script'),
    scriptOffsetRatio: ratio()
      .default(0.2)
      .describe('Baseline offset (in band font sizes) marking a script'),
    scriptProximity: z
      .number()
      .nonnegative()
      .default(0.5)
      .describe('Max gap to the base token, in band font sizes'),

    tableMinRows: z.number().int().min(2).default(3),
    tableMinCols: z.number().int().min(2).default(3),
    tableCellGap: z
      .number()
      .positive()
      .default(15)
      .describe('Gap separating two cells of an aligned row'),
    tableAlignTolerance: z
      .number()
      .nonnegative()
      .default(5)
      .describe('Tolerance for cell edges to count as aligned'),
    tableFormat: z.enum(['markdown', 'plain']).default('markdown'),

    footnoteZone: z
      .number()
      .min(0)
      .max(0.5)
      .default(0.15)
      .describe('Bottom page fraction holding footnote definitions'),
    footnoteAcceptThreshold: ratio()
      .default(0.5)
      .describe('Match confidence must exceed this value'),

    qualityThreshold: z.number().min(0).max(100).default(70),
    coverageThreshold: ratio().default(0.7),
    maxAttempts: z.number().int().min(1).default(2),

    ocrWordThreshold: z
      .number()
      .int()
      .nonnegative()
      .default(10)
      .describe('Pages with fewer tokens are sent to the OCR collaborator'),
    encodingAnomalyRatio: ratio()
      .default(0.3)
      .describe('Share of corrupted tokens marking an encoding anomaly'),
    collaboratorTimeoutMs: z.number().int().positive().default(30000),
    collaboratorRetries: z.number().int().nonnegative().default(2),
    llmConfidenceCutoff: ratio().default(0.8),
    llmContextChars: z.number().int().nonnegative().default(100),
  })
  .strict();

export type ExtractionConfigInput = z.input<typeof extractionConfigSchema>;

export type ExtractionConfig = Readonly<z.output<typeof extractionConfigSchema>>;

/**
 * Build an immutable configuration from optional overrides.
 *
 * @throws InvalidConfigError when an override is out of range or unknown
 */
export function createExtractionConfig(
  overrides: ExtractionConfigInput = {},
): ExtractionConfig {
  const result = extractionConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return Object.freeze(result.data);
}

/**
 * Alternate parameters for one remediation attempt.
 *
 * Sets are declarative so that a run can be replayed from its report.
 */
export interface ParameterSet {
  readonly label: string;

  /**
   * Overrides `marginFiltering` when set
   */
  readonly marginFiltering?: boolean;

  /**
   * Multiplies the base `columnGap` when set
   */
  readonly columnGapScale?: number;
}

/**
 * Ordered parameter sets: baseline, then margin filtering disabled, then a
 * looser column gap on top of that.
 */
export const DEFAULT_PARAMETER_SETS: readonly ParameterSet[] = Object.freeze([
  { label: 'baseline' },
  { label: 'margin-filtering-off', marginFiltering: false },
  { label: 'loose-column-gap', marginFiltering: false, columnGapScale: 0.6 },
]);

/**
 * Derive the configuration of an attempt from the base configuration.
 */
export function applyParameterSet(
  base: ExtractionConfig,
  set: ParameterSet,
): ExtractionConfig {
  return createExtractionConfig({
    ...base,
    marginFiltering: set.marginFiltering ?? base.marginFiltering,
    columnGap: base.columnGap * (set.columnGapScale ?? 1),
  });
}
