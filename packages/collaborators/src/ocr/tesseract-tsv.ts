import type { PageInput, Token } from '@glyphorder/model';

/** TSV row level of a recognized word */
const WORD_LEVEL = 5;

/** TSV row level of the page itself; its box is the image size */
const PAGE_LEVEL = 1;

interface TsvRow {
  level: number;
  left: number;
  top: number;
  width: number;
  height: number;
  conf: number;
  text: string;
}

function parseRow(line: string): TsvRow | undefined {
  const cols = line.split('\t');
  if (cols.length < 12) return undefined;
  const [level, left, top, width, height, conf] = [0, 6, 7, 8, 9, 10].map(
    (i) => Number(cols[i]),
  );
  if ([level, left, top, width, height, conf].some(Number.isNaN)) {
    return undefined;
  }
  return {
    level,
    left,
    top,
    width,
    height,
    conf,
    text: cols.slice(11).join('\t').trim(),
  };
}

/**
 * Convert `tesseract <image> - tsv` output into page tokens.
 *
 * Pixel boxes are scaled to page points using the page-level row; words
 * with an empty text or a negative confidence are skipped. Confidence is
 * mapped from 0-100 to [0,1].
 */
export function parseTesseractTsv(
  tsv: string,
  page: Pick<PageInput, 'pageNo' | 'width' | 'height'>,
): Token[] {
  const rows = tsv
    .split(/\r?\n/)
    .slice(1)
    .map(parseRow)
    .filter((row): row is TsvRow => row !== undefined);

  const pageRow = rows.find((row) => row.level === PAGE_LEVEL);
  const scaleX = pageRow && pageRow.width > 0 ? page.width / pageRow.width : 1;
  const scaleY =
    pageRow && pageRow.height > 0 ? page.height / pageRow.height : 1;

  return rows
    .filter((row) => row.level === WORD_LEVEL && row.text && row.conf >= 0)
    .map((row) => {
      const y0 = row.top * scaleY;
      const y1 = (row.top + row.height) * scaleY;
      return {
        text: row.text,
        bbox: {
          x0: row.left * scaleX,
          y0,
          x1: (row.left + row.width) * scaleX,
          y1,
        },
        fontSize: y1 - y0,
        baselineY: y1,
        pageNo: page.pageNo,
        confidence: Math.min(1, row.conf / 100),
      };
    });
}
