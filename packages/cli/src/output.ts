/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @kuberoute/cli/output
 */

import chalk from 'chalk';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table';

/**
 * Check if a value names an output format
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

/**
 * Global output format setting (can be overridden per command)
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Table column description
 */
export interface Column<T> {
  key: keyof T & string;
  header: string;
  width?: number;
}

/**
 * Render rows as aligned text lines, header and separator first
 */
export function renderTable<T extends object>(data: readonly T[], columns: ReadonlyArray<Column<T>>): string[] {
  const cell = (row: T, key: keyof T): string => {
    const value = row[key];
    return value === null || value === undefined ? '' : String(value);
  };

  const widths = columns.map((col) =>
    col.width ?? Math.max(col.header.length, 4, ...data.map((row) => cell(row, col.key).length)),
  );
  const pad = (text: string, i: number): string => text.padEnd(widths[i] ?? text.length);

  const lines = [
    columns.map((col, i) => pad(col.header, i)).join('  ').trimEnd(),
    widths.map((w) => '─'.repeat(w)).join('──'),
  ];
  for (const row of data) {
    lines.push(columns.map((col, i) => pad(cell(row, col.key), i)).join('  ').trimEnd());
  }
  return lines;
}

/**
 * Prints rows as a table, or as JSON under the json format
 */
export function table<T extends object>(data: readonly T[], columns: ReadonlyArray<Column<T>>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (data.length === 0) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  const [header, separator, ...rows] = renderTable(data, columns);
  console.log(chalk.bold(header));
  console.log(separator);
  for (const row of rows) {
    console.log(row);
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a record's health
 */
export function aliveBadge(alive: boolean): string {
  return alive ? chalk.green('●') + ' ' + chalk.green('alive') : chalk.red('●') + ' ' + chalk.red('failover');
}
