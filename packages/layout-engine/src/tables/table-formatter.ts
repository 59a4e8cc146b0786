import type { Table, TableFormat } from '@glyphorder/model';

import { normalizeWhitespace } from '../utils/text';

function escapeMarkdownCell(text: string): string {
  return normalizeWhitespace(text).replace(/\|/g, '\\|');
}

/**
 * Render a table as a markdown pipe table (first row as header) or as
 * tab-separated plain text.
 */
export function formatTable(table: Table, format: TableFormat): string {
  if (table.cells.length === 0) return '';

  if (format === 'plain') {
    return table.cells
      .map((row) => row.map((cell) => normalizeWhitespace(cell.text)).join('\t'))
      .join('\n');
  }

  const lines = table.cells.map(
    (row) => `| ${row.map((cell) => escapeMarkdownCell(cell.text)).join(' | ')} |`,
  );
  const separator = `| ${Array.from({ length: table.cols }, () => '---').join(' | ')} |`;
  return [lines[0], separator, ...lines.slice(1)].join('\n');
}
