/**
 * Display Helpers
 * Common display patterns for CLI commands
 */

import chalk from 'chalk';

const SEPARATOR_WIDTH = 60;

/**
 * Display a section header with separator lines
 */
export function displayHeader(title: string): void {
  console.log(`\n${chalk.bold('='.repeat(SEPARATOR_WIDTH))}`);
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(SEPARATOR_WIDTH)));
}

export function displayFooter(): void {
  console.log(`${chalk.bold('='.repeat(SEPARATOR_WIDTH))}\n`);
}

/**
 * Display a key-value pair with optional indentation
 */
export function displayKeyValue(key: string, value: string, indent = 2): void {
  const spaces = ' '.repeat(indent);
  console.log(chalk.white(`${spaces}${key}: ${value}`));
}

/**
 * Display a list of items with bullet points
 */
export function displayList(
  items: readonly string[],
  options?: { color?: 'red' | 'yellow' | 'gray'; maxItems?: number }
): void {
  const { color = 'gray', maxItems = 10 } = options ?? {};
  const colorFn = color === 'red' ? chalk.red : color === 'yellow' ? chalk.yellow : chalk.gray;

  for (const item of items.slice(0, maxItems)) {
    console.log(colorFn(`  • ${item}`));
  }

  if (items.length > maxItems) {
    console.log(colorFn(`  ... and ${items.length - maxItems} more`));
  }
}

/**
 * Lay out plain-text cells in left-aligned columns; the first line holds the headers
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: readonly string[]) =>
    widths
      .map((width, i) => (cells[i] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();
  return [line(headers), line(widths.map((width) => '-'.repeat(width))), ...rows.map(line)];
}

export function displayTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  colorRow: (line: string, rowIndex: number) => string = (line) => line
): void {
  const [head = '', rule = '', ...body] = renderTable(headers, rows);
  console.log(chalk.bold(head));
  console.log(chalk.gray(rule));
  body.forEach((line, i) => {
    console.log(colorRow(line, i));
  });
}

export function displaySuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function displayWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`));
}

export function displayError(message: string): void {
  console.log(chalk.red(`✗ ${message}`));
}
