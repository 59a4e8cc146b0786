/**
 * Fixed constants for band construction and token joining
 */
export const READING_ORDER = {
  /**
   * Tokens at least this fraction of the band's largest font count as body
   * tokens when computing band baseline and font size
   */
  BODY_FONT_RATIO: 0.8,

  /**
   * CJK tokens are joined without a space unless the gap exceeds this many
   * font sizes
   */
  CJK_GAP_RATIO: 1.0,
} as const;

/**
 * Constants for MetadataFilter
 */
export const METADATA_FILTER = {
  /**
   * Line runs with more tokens than this are never page-number candidates
   */
  MAX_CANDIDATE_TOKENS: 3,

  /**
   * Line runs longer than this (characters) are never page-number candidates
   */
  MAX_CANDIDATE_LENGTH: 20,

  /**
   * Positions are rounded to this many points when detecting duplicate glyphs
   */
  DUPLICATE_POSITION_STEP: 1,
} as const;

/**
 * Constants for ElementInventory
 */
export const INVENTORY = {
  /**
   * Tokens whose centre lies above this page fraction are in the top band
   */
  TOP_REGION: 0.15,

  /**
   * Tokens whose centre lies below this page fraction are in the bottom band
   */
  BOTTOM_REGION: 0.85,

  /**
   * Font size thresholds (pt): large > 18, standard >= 10, small >= 6,
   * tiny otherwise
   */
  LARGE_FONT: 18,
  STANDARD_FONT: 10,
  SMALL_FONT: 6,

  /**
   * Coverage status thresholds
   */
  GOOD_COVERAGE: 0.85,
  WARNING_COVERAGE: 0.7,
} as const;

/**
 * Constants for table detection
 */
export const TABLE_DETECTION = {
  /**
   * Segments thinner than this (pt) along one axis are ruling lines
   */
  LINE_TOLERANCE: 2,

  /**
   * Ruling lines shorter than this (pt) are ignored
   */
  MIN_LINE_LENGTH: 10,

  /**
   * Ruling line positions closer than this (pt) are one grid line
   */
  CLUSTER_TOLERANCE: 3,

  /**
   * Ruled-line confidence: BASE + FILL_WEIGHT * (non-empty cells / cells)
   */
  RULED_BASE_CONFIDENCE: 0.85,
  RULED_FILL_WEIGHT: 0.15,

  /**
   * Alignment confidence: BASE + FILL_WEIGHT * (filled cells / cells)
   */
  ALIGNMENT_BASE_CONFIDENCE: 0.5,
  ALIGNMENT_FILL_WEIGHT: 0.3,

  /**
   * Rows whose cells hold more tokens than this are prose, not table rows
   */
  MAX_CELL_TOKENS: 8,

  /**
   * Cells with at least this many tokens read as prose. Rows of such cells
   * split by column gutters are text columns, not a table
   */
  PROSE_CELL_TOKENS: 3,

  /**
   * Aligned rows further apart than this many font sizes start a new table
   */
  MAX_ROW_GAP_RATIO: 2.5,

  /**
   * Overlap (intersection / smaller area) at which two detections cover the
   * same region
   */
  SAME_REGION_OVERLAP: 0.5,

  /**
   * Confidence bonus when both strategies agree on the grid
   */
  AGREEMENT_BONUS: 0.05,

  /**
   * Confidence multiplier applied to the alignment result when the strategies
   * disagree on the grid
   */
  DISAGREEMENT_FACTOR: 0.75,

  /**
   * Confidence multiplier applied to a ruled table partially overlapped by an
   * alignment detection
   */
  PARTIAL_OVERLAP_FACTOR: 0.9,
} as const;

/**
 * Constants for FootnoteMatcher
 */
export const FOOTNOTE_MATCHING = {
  /**
   * Weight of exact marker-text equality in the match confidence
   */
  EXACT_WEIGHT: 0.5,

  /**
   * Weight of page proximity in the match confidence
   */
  PROXIMITY_WEIGHT: 0.5,

  /**
   * Proximity drops linearly to zero at this page distance
   */
  PROXIMITY_PAGE_SPAN: 3,
} as const;

/**
 * Constants for AntiHallucinationVerifier
 */
export const VERIFICATION = {
  /**
   * Minimum output/inventory element ratio
   */
  MIN_ELEMENT_RATIO: 0.7,

  /**
   * Element ratio above which duplication is suspected
   */
  DUPLICATION_RATIO: 1.5,

  /**
   * Minimum position-distribution similarity
   */
  MIN_POSITION_SIMILARITY: 0.8,
} as const;

/**
 * QualityScorer weights (sum to 1) and grade cut-offs
 */
export const QUALITY = {
  WEIGHTS: {
    coverage: 0.35,
    hallucination: 0.25,
    footnotes: 0.15,
    tables: 0.1,
    ordering: 0.15,
  },
  GRADES: [
    { grade: 'A', min: 90 },
    { grade: 'B', min: 80 },
    { grade: 'C', min: 70 },
    { grade: 'D', min: 60 },
  ],
} as const;

/**
 * Constants for suspect span detection and LLM correction
 */
export const SPAN_CORRECTION = {
  /**
   * OCR tokens below this confidence are sent for correction
   */
  MIN_OCR_CONFIDENCE: 0.6,

  /**
   * Upper bound of spans sent per page
   */
  MAX_SPANS_PER_PAGE: 20,
} as const;

/**
 * Constants for BatchExtractor
 */
export const BATCH = {
  /**
   * Documents processed at once when no concurrency is given
   */
  DEFAULT_CONCURRENCY: 4,
} as const;
