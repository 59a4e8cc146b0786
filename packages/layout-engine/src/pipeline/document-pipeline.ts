import type { LoggerMethods } from '@glyphorder/logger';
import type {
  DocumentInventory,
  FootnoteReport,
  PageResult,
  QualityScore,
  VerificationReport,
} from '@glyphorder/model';

import type { ExtractionConfig } from '../config/extraction-config';
import type { PreparedPage } from '../preparation/page-preparer';
import type { ScoredRun } from '../remediation/remediation-controller';

import { RepeatingElementDetector } from '../detectors/repeating-element-detector';
import { FootnoteMatcher } from '../footnotes/footnote-matcher';
import { QualityScorer } from '../scoring/quality-scorer';
import { AntiHallucinationVerifier } from '../verification/anti-hallucination-verifier';
import { PageAssembler } from './page-assembler';

/**
 * Output of one full pass over a document.
 */
export interface PipelineRun extends ScoredRun {
  readonly pages: readonly PageResult[];
  readonly footnotes: FootnoteReport;
  readonly verification: VerificationReport;
  readonly quality: QualityScore;
}

/**
 * One synchronous extraction pass with a fixed configuration.
 *
 * Prepared pages and the inventory are only read, so the same inputs can
 * be run again under another parameter set.
 */
export class DocumentPipeline {
  private readonly logger: LoggerMethods;
  private readonly config: ExtractionConfig;

  constructor(logger: LoggerMethods, config: ExtractionConfig) {
    this.logger = logger;
    this.config = config;
  }

  run(
    pages: readonly PreparedPage[],
    inventory: DocumentInventory,
  ): PipelineRun {
    const repeating = new RepeatingElementDetector(
      this.logger,
      this.config,
    ).detect(pages.filter((page) => page.status !== 'placeholder'));
    const assembler = new PageAssembler(
      this.logger,
      this.config,
      repeating.tokens,
    );
    const assembled = pages.map((page) => assembler.assemble(page));

    const footnotes = new FootnoteMatcher(
      this.logger,
      this.config.footnoteAcceptThreshold,
    ).match(
      assembled.flatMap((page) => page.markers),
      assembled.flatMap((page) => page.definitions),
    );

    return this.evaluate(assembled, pages, inventory, footnotes);
  }

  /**
   * Verify and score finished page results against their prepared pages.
   * Also used after span correction changes the text.
   */
  evaluate(
    results: readonly PageResult[],
    pages: readonly PreparedPage[],
    inventory: DocumentInventory,
    footnotes: FootnoteReport,
  ): PipelineRun {
    const sources = new Map(
      pages.map((page) => [
        page.pageNo,
        page.tokens.map((token) => token.text),
      ]),
    );
    const { pages: verified, report } = new AntiHallucinationVerifier(
      this.logger,
    ).verify(
      results.map((result) => ({
        result,
        sourceTexts: sources.get(result.pageNo) ?? [],
      })),
      inventory,
      footnotes,
    );
    const quality = QualityScorer.score(report, verified.length);

    this.logger.debug(
      `[DocumentPipeline] ${verified.length} page(s): score ${quality.score} (${quality.grade})`,
    );
    return { pages: verified, footnotes, verification: report, quality };
  }
}
