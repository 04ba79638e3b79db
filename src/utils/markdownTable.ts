import { InvalidRowError } from './errors.js';

export type ColumnAlignment = 'left' | 'right';

const CELL_PADDING = 2;

function alignCell(text: string, width: number, alignment: ColumnAlignment): string {
  return alignment === 'right' ? text.padStart(width) : text.padEnd(width);
}

/**
 * Render a fixed-width markdown table.
 *
 * Every column is as wide as its longest cell (header included) plus one space
 * on either side. The separator uses one dash per column character, so all
 * lines of a table have the same width. The result always ends with a newline.
 *
 * @param alignments - per-column alignment; columns without one are left aligned
 * @throws InvalidRowError when a row's cell count differs from the header count
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  alignments: readonly ColumnAlignment[] = [],
): string {
  rows.forEach((row, index) => {
    if (row.length !== headers.length) {
      throw new InvalidRowError(index, headers.length, row.length);
    }
  });

  const widths = headers.map(
    (header, i) =>
      Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)) + CELL_PADDING,
  );

  const formatLine = (cells: readonly string[]): string =>
    `| ${cells
      .map((cell, i) => {
        const contentWidth = (widths[i] ?? CELL_PADDING) - CELL_PADDING;
        return alignCell(cell, contentWidth, alignments[i] ?? 'left');
      })
      .join(' | ')} |`;

  const separator = `|${widths.map((width) => '-'.repeat(width)).join('|')}|`;

  return [formatLine(headers), separator, ...rows.map(formatLine)].join('\n') + '\n';
}
