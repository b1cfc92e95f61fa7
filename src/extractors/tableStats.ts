/**
 * tableStats.ts — Deterministic per-column statistics for tabular payloads.
 *
 * Language models are unreliable at arithmetic over dozens of cells, so the
 * answer prompt carries these precomputed figures next to the raw rows.
 */

export interface ColumnStats {
  column: string;
  count: number;
  sum: number;
  mean: number;
  min: number;
  max: number;
}

/**
 * Parse a cell as a number, accepting thousands separators, currency
 * symbols and a trailing percent sign. Null for anything else.
 */
export function parseNumericCell(cell: string): number | null {
  const cleaned = cell.trim().replace(/^[$€£]/, '').replace(/%$/, '').replace(/,/g, '').trim();
  if (cleaned === '' || !/^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

/**
 * Statistics for every column whose non-empty cells are all numeric.
 * Columns without headers are named by their 1-based position.
 */
export function computeColumnStats(headers: string[], rows: string[][]): ColumnStats[] {
  const width = Math.max(headers.length, ...rows.map((row) => row.length));
  const stats: ColumnStats[] = [];

  for (let col = 0; col < width; col++) {
    const values: number[] = [];
    let numeric = true;

    for (const row of rows) {
      const cell = row[col] ?? '';
      if (cell.trim() === '') continue;
      const value = parseNumericCell(cell);
      if (value === null) {
        numeric = false;
        break;
      }
      values.push(value);
    }

    if (!numeric || values.length === 0) continue;

    const sum = values.reduce((acc, v) => acc + v, 0);
    stats.push({
      column: headers[col]?.trim() || `Column ${col + 1}`,
      count: values.length,
      sum: round(sum),
      mean: round(sum / values.length),
      min: Math.min(...values),
      max: Math.max(...values),
    });
  }

  return stats;
}

export function formatColumnStats(stats: ColumnStats[]): string {
  return stats
    .map((s) => `${s.column}: count=${s.count} sum=${s.sum} mean=${s.mean} min=${s.min} max=${s.max}`)
    .join('\n');
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
