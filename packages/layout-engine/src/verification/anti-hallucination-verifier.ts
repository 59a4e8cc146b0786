import type { LoggerMethods } from '@glyphorder/logger';
import type {
  DocumentInventory,
  Flag,
  FootnoteReport,
  PageResult,
  PositionBand,
  VerificationReport,
} from '@glyphorder/model';

import { VERIFICATION } from '../config/constants';
import { ElementInventory, emptyPositionCounts } from '../inventory/element-inventory';
import {
  checkPageMarkers,
  renderDocumentText,
} from '../report/document-text-renderer';
import { clamp01, mean } from '../utils/geometry';
import {
  buildSourceCorpus,
  scanForHallucinations,
  stripFindings,
} from './hallucination-rules';

export interface VerificationPage {
  readonly result: PageResult;

  /** Text of every token the page started with, before filtering */
  readonly sourceTexts: readonly string[];
}

export interface VerificationOutcome {
  /** Page results with unsupported spans stripped */
  readonly pages: readonly PageResult[];
  readonly report: VerificationReport;
}

const POSITION_BANDS: readonly PositionBand[] = ['top', 'middle', 'bottom'];

/**
 * Cross-checks finished page text against the frozen inventory and the
 * source tokens.
 *
 * Spans matching a hallucination rule with no support in the page's source
 * are stripped and flagged. Inventory checks, footnote consistency and the
 * page-marker sequence produce flags without touching the text.
 */
export class AntiHallucinationVerifier {
  private readonly logger: LoggerMethods;

  constructor(logger: LoggerMethods) {
    this.logger = logger;
  }

  verify(
    pages: readonly VerificationPage[],
    inventory: DocumentInventory,
    footnotes: FootnoteReport,
  ): VerificationOutcome {
    const flags: Flag[] = [];

    const verified = pages.map((page) => this.stripPage(page, flags));

    flags.push(...this.footnoteFlags(footnotes));
    flags.push(...this.tableFlags(verified));
    flags.push(...this.pageMarkerFlags(verified));

    const extracted = verified.reduce(
      (sum, page) => sum + page.extractedTokenCount,
      0,
    );
    const coverage = ElementInventory.coverage(inventory, extracted);
    const elementCountRatio =
      inventory.total > 0 ? extracted / inventory.total : 0;
    const positionSimilarity = this.positionSimilarity(inventory, verified);
    const passed =
      elementCountRatio >= VERIFICATION.MIN_ELEMENT_RATIO &&
      positionSimilarity >= VERIFICATION.MIN_POSITION_SIMILARITY;

    if (!passed) {
      flags.push({
        type: 'missing_content',
        severity: 'high',
        pageNo: 0,
        rule: 'inventory-check',
        message: `Inventory check failed: element ratio ${elementCountRatio.toFixed(2)} (min ${VERIFICATION.MIN_ELEMENT_RATIO.toFixed(2)}), position similarity ${positionSimilarity.toFixed(2)} (min ${VERIFICATION.MIN_POSITION_SIMILARITY.toFixed(2)})`,
        stripped: false,
      });
    }
    if (elementCountRatio > VERIFICATION.DUPLICATION_RATIO) {
      flags.push({
        type: 'layout_issue',
        severity: 'medium',
        pageNo: 0,
        rule: 'element-duplication',
        message: `Output holds ${elementCountRatio.toFixed(2)}x the inventory; content may be duplicated`,
        stripped: false,
      });
    }

    const tables = verified.flatMap((page) => page.tables);
    const report: VerificationReport = {
      coverage,
      coverageStatus: ElementInventory.coverageStatus(coverage),
      elementCountRatio,
      positionSimilarity,
      passed,
      flags,
      footnoteMatchRate: footnotes.matchRate,
      tableMatchRate:
        tables.length > 0 ? mean(tables.map((table) => table.confidence)) : 1,
      orderingConsistent: verified.every((page) =>
        AntiHallucinationVerifier.isOrderingConsistent(page),
      ),
    };

    this.logger.info(
      `[AntiHallucinationVerifier] Coverage ${coverage.toFixed(3)} (${report.coverageStatus}), ${flags.length} flag(s), inventory check ${passed ? 'passed' : 'failed'}`,
    );
    return { pages: verified, report };
  }

  /**
   * Band tops never decrease within a column.
   */
  static isOrderingConsistent(page: Pick<PageResult, 'columns'>): boolean {
    return page.columns.every((column) =>
      column.bands.every(
        (band, i) => i === 0 || band.bbox.y0 >= column.bands[i - 1].bbox.y0,
      ),
    );
  }

  private stripPage(page: VerificationPage, flags: Flag[]): PageResult {
    const { result } = page;
    if (result.status === 'placeholder' || result.status === 'unextractable') {
      return result;
    }

    const corpus = buildSourceCorpus(page.sourceTexts);
    const findings = scanForHallucinations(result.text, corpus);
    if (findings.length === 0) return result;

    for (const finding of findings) {
      flags.push({
        type: 'hallucination',
        severity: finding.rule.severity,
        pageNo: result.pageNo,
        rule: finding.rule.id,
        message: `${finding.rule.description} not found in source tokens`,
        span: finding.span,
        stripped: true,
      });
    }
    this.logger.warn(
      `[AntiHallucinationVerifier] Page ${result.pageNo}: stripped ${findings.length} unsupported span(s)`,
    );
    return { ...result, text: stripFindings(result.text, findings) };
  }

  private footnoteFlags(footnotes: FootnoteReport): Flag[] {
    const defined = new Set(
      [
        ...footnotes.matches.map((match) => match.definition),
        ...footnotes.unmatchedDefinitions,
      ].map((definition) => definition.markerText),
    );

    const flags: Flag[] = footnotes.unmatchedMarkers.map((marker) => {
      const anywhere = defined.has(marker.markerText);
      return {
        type: 'footnote_mismatch',
        severity: anywhere ? 'low' : 'medium',
        pageNo: marker.pageNo,
        rule: 'footnote-unmatched-marker',
        message: anywhere
          ? `Footnote marker "${marker.markerText}" has no definition close enough to page ${marker.pageNo}`
          : `Footnote marker "${marker.markerText}" has no definition in the document`,
        span: marker.markerText,
        stripped: false,
      };
    });

    for (const definition of footnotes.unmatchedDefinitions) {
      flags.push({
        type: 'footnote_mismatch',
        severity: 'low',
        pageNo: definition.pageNo,
        rule: 'footnote-unmatched-definition',
        message: `Footnote definition "${definition.markerText}" has no marker`,
        span: definition.markerText,
        stripped: false,
      });
    }
    return flags;
  }

  private tableFlags(pages: readonly PageResult[]): Flag[] {
    return pages.flatMap((page) =>
      page.tables
        .filter((table) => table.ambiguous)
        .map(
          (table): Flag => ({
            type: 'table_issue',
            severity: 'low',
            pageNo: page.pageNo,
            rule: 'table-ambiguous',
            message: `Table strategies disagreed; kept the ${table.strategy} grid at confidence ${table.confidence.toFixed(2)}`,
            stripped: false,
          }),
        ),
    );
  }

  /**
   * Renders the document the way a consumer receives it and checks the
   * marker sequence. Markers are generated per page, so this fires only when
   * page text itself holds marker-shaped lines that would corrupt the
   * rendered sequence.
   */
  private pageMarkerFlags(pages: readonly PageResult[]): Flag[] {
    const text = renderDocumentText(pages);
    return checkPageMarkers(
      text,
      pages.map((page) => page.pageNo),
    ).map((problem) => ({
      type: 'layout_issue',
      severity: 'high',
      pageNo: 0,
      rule: 'page-markers',
      message: problem,
      stripped: false,
    }));
  }

  /**
   * 1 - half the L1 distance between the inventory's position distribution
   * and that of the extracted tokens.
   */
  private positionSimilarity(
    inventory: DocumentInventory,
    pages: readonly PageResult[],
  ): number {
    const extracted = emptyPositionCounts();
    for (const page of pages) {
      for (const band of POSITION_BANDS) {
        extracted[band] += page.extractedByPosition[band];
      }
    }
    const extractedTotal = POSITION_BANDS.reduce(
      (sum, band) => sum + extracted[band],
      0,
    );
    if (inventory.total === 0 || extractedTotal === 0) return 0;

    const distance = POSITION_BANDS.reduce(
      (sum, band) =>
        sum +
        Math.abs(
          inventory.byPosition[band] / inventory.total -
            extracted[band] / extractedTotal,
        ),
      0,
    );
    return clamp01(1 - distance / 2);
  }
}
