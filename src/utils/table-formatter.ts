import chalk from 'chalk';
import { truncateString } from './format-utils';

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
  color?: (value: string) => string;
}

export interface TableRow {
  [header: string]: string | number;
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Printable width of a string that may carry ANSI color codes
 */
export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/**
 * Box-drawn console table; cells are looked up by column header
 */
export class TableFormatter {
  private readonly rows: TableRow[] = [];

  constructor(private readonly columns: TableColumn[]) {}

  addRow(row: TableRow): void {
    this.rows.push(row);
  }

  render(): string {
    if (this.rows.length === 0) return '';

    const separator = this.columns.map(col => '─'.repeat(col.width)).join('─┼─');
    const output: string[] = [];

    output.push('┌─' + separator.replace(/┼/g, '┬') + '─┐');
    output.push(this.renderLine(this.columns.map(col => chalk.bold(col.header))));
    output.push(`├─${separator}─┤`);

    for (const row of this.rows) {
      output.push(
        this.renderLine(
          this.columns.map(col => {
            const value = String(row[col.header] ?? '');
            return col.color ? col.color(value) : value;
          })
        )
      );
    }

    output.push('└─' + separator.replace(/┼/g, '┴') + '─┘');
    return output.join('\n');
  }

  private renderLine(cells: string[]): string {
    const padded = cells.map((cell, i) => {
      const column = this.columns[i];
      return column ? padCell(cell, column.width, column.align) : cell;
    });
    return `│ ${padded.join(' │ ')} │`;
  }
}

function padCell(content: string, width: number, align: 'left' | 'right' = 'left'): string {
  const padding = width - visibleLength(content);

  if (padding < 0) {
    // Colors are dropped from cells that have to be cut
    return truncateString(content.replace(ANSI_PATTERN, ''), width);
  }

  return align === 'right' ? ' '.repeat(padding) + content : content + ' '.repeat(padding);
}

export function createTable(columns: TableColumn[]): TableFormatter {
  return new TableFormatter(columns);
}

// Simple list formatter for non-tabular data
export function formatList(
  items: string[],
  options: {
    bullet?: string;
    indent?: number;
    maxItems?: number;
  } = {}
): string {
  const { bullet = '•', indent = 2, maxItems } = options;
  const displayItems = maxItems ? items.slice(0, maxItems) : items;
  const indentStr = ' '.repeat(indent);

  const formatted = displayItems.map(item => `${indentStr}${bullet} ${item}`);

  if (maxItems && items.length > maxItems) {
    formatted.push(`${indentStr}... and ${items.length - maxItems} more`);
  }

  return formatted.join('\n');
}
