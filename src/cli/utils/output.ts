/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

/** Keys whose array values render as a table */
const LIST_KEYS = ['documents', 'rounds', 'variables', 'removed'] as const;

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsTable(result);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (!isRecord(result)) {
    return String(result);
  }

  const sections: string[] = [];
  const scalars: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(result)) {
    if (value === undefined) continue;
    if (Array.isArray(value) && LIST_KEYS.some((k) => k === key)) {
      sections.push(`${key}:\n${formatArrayAsTable(value)}`);
    } else if (isRecord(value)) {
      sections.push(`${key}:\n${indent(formatAsTable(value))}`);
    } else {
      scalars[key] = value;
    }
  }

  const head = formatObjectAsKeyValue(scalars);
  return [head, ...sections].filter(Boolean).join('\n\n');
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  if (rows.length !== items.length) {
    return items.map(formatValue).join('\n');
  }

  // Columns from the first row, at most 8
  const keys = Object.keys(rows[0] ?? {}).slice(0, 8);
  const widths = calculateColumnWidths(rows, keys);

  const header = keys.map((k, i) => k.padEnd(widths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(widths[i] ?? k.length)).join('-+-');
  const body = rows.map((row) =>
    keys
      .map((k, i) => {
        const width = widths[i] ?? k.length;
        return formatValue(row[k]).slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...body].join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > 40 ? str.slice(0, 37) + '...' : str;
  }
  return String(value);
}

function calculateColumnWidths(items: Record<string, unknown>[], keys: string[]): number[] {
  return keys.map((key) => {
    const maxValue = Math.max(...items.map((item) => formatValue(item[key]).length));
    return Math.max(key.length, Math.min(maxValue, 40)); // Cap at 40 chars
  });
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  return Object.entries(obj)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join('\n');
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}
