import type { LoggerMethods } from '@glyphorder/logger';
import type { PageInput, PageIssue, Table, Token } from '@glyphorder/model';

import type { TableDetectorConfig } from './table-detector-config';

import { AlignmentDetector } from './alignment-detector';
import { RuledLineDetector } from './ruled-line-detector';
import { TableReconciler } from './table-reconciler';

export interface TableDetection {
  readonly tables: readonly Table[];
  readonly issues: readonly PageIssue[];
}

/**
 * Runs both table strategies on a page and reconciles their regions.
 */
export class TableDetector {
  private readonly logger: LoggerMethods;
  private readonly ruled: RuledLineDetector;
  private readonly aligned: AlignmentDetector;

  constructor(logger: LoggerMethods, config: TableDetectorConfig) {
    this.logger = logger;
    this.ruled = new RuledLineDetector(config);
    this.aligned = new AlignmentDetector(config);
  }

  detect(
    page: Pick<PageInput, 'pageNo' | 'lines'>,
    tokens: readonly Token[],
  ): TableDetection {
    const ruled = this.ruled.detect(page.pageNo, page.lines ?? [], tokens);
    const aligned = this.aligned.detect(page.pageNo, tokens);
    const result = TableReconciler.reconcile(page.pageNo, ruled, aligned);

    if (result.tables.length > 0) {
      this.logger.debug(
        `[TableDetector] Page ${page.pageNo}: ${result.tables.length} table(s) (${ruled.length} ruled, ${aligned.length} aligned)`,
      );
    }
    for (const issue of result.issues) {
      this.logger.warn(`[TableDetector] Page ${page.pageNo}: ${issue.message}`);
    }
    return result;
  }
}
