import type { PageResult } from '@glyphorder/model';

type RenderablePage = Pick<PageResult, 'pageNo' | 'text'>;

const MARKER = /^--- PAGE (\d+) (START|END) ---$/gm;

export function pageStartMarker(pageNo: number): string {
  return `--- PAGE ${pageNo} START ---`;
}

export function pageEndMarker(pageNo: number): string {
  return `--- PAGE ${pageNo} END ---`;
}

/**
 * Join page texts into one document, each page wrapped in START/END
 * markers unless `pageMarkers` is false.
 */
export function renderDocumentText(
  pages: readonly RenderablePage[],
  pageMarkers = true,
): string {
  if (!pageMarkers) {
    return pages
      .map((page) => page.text)
      .filter((text) => text.length > 0)
      .join('\n\n');
  }
  return pages
    .map((page) =>
      [pageStartMarker(page.pageNo), page.text, pageEndMarker(page.pageNo)]
        .filter((line) => line.length > 0)
        .join('\n'),
    )
    .join('\n\n');
}

/**
 * Problems with the page-marker sequence of a rendered document: unequal
 * START/END counts, a page count other than expected, or markers out of
 * order. Empty when the sequence is intact.
 */
export function checkPageMarkers(
  text: string,
  expectedPageNos: readonly number[],
): string[] {
  const markers = [...text.matchAll(MARKER)].map((match) => ({
    pageNo: Number(match[1]),
    kind: match[2],
  }));
  const starts = markers.filter((m) => m.kind === 'START').length;
  const ends = markers.length - starts;
  const problems: string[] = [];

  if (starts !== ends) {
    problems.push(
      `Page marker mismatch: ${starts} START markers but ${ends} END markers`,
    );
  }
  if (starts !== expectedPageNos.length) {
    problems.push(
      `Page count mismatch: expected ${expectedPageNos.length} pages but found ${starts}`,
    );
  }

  const expected = expectedPageNos.flatMap((pageNo) => [
    { pageNo, kind: 'START' },
    { pageNo, kind: 'END' },
  ]);
  const broken = expected.findIndex(
    (want, i) =>
      markers[i]?.pageNo !== want.pageNo || markers[i]?.kind !== want.kind,
  );
  if (broken !== -1 && problems.length === 0) {
    const want = expected[broken];
    problems.push(
      `Page marker sequence broken: expected PAGE ${want.pageNo} ${want.kind} at position ${broken + 1}`,
    );
  }
  return problems;
}
