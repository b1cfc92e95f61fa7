/**
 * jsonExtractor.ts — JSON resources. Arrays of flat records are also
 * summarized as a table so their numeric columns get statistics.
 */

import { ExtractionError } from '../core/errors';
import type { Extraction } from '../core/types';
import { BaseExtractor } from './baseExtractor';
import { computeColumnStats, formatColumnStats } from './tableStats';

type Scalar = string | number | boolean | null;

export class JsonExtractor extends BaseExtractor {
  readonly contentKind = 'json' as const;

  async extract(raw: Buffer): Promise<Extraction> {
    let value: unknown;
    try {
      value = JSON.parse(this.decodeUtf8(raw));
    } catch (err) {
      throw new ExtractionError('json', err instanceof Error ? err.message : String(err), { cause: err });
    }

    const parts = [`JSON document:\n${JSON.stringify(value, null, 2)}`];

    const records = asFlatRecords(value);
    if (records) {
      const headers = [...new Set(records.flatMap((record) => Object.keys(record)))];
      const rows = records.map((record) => headers.map((h) => cellText(record[h])));
      const stats = computeColumnStats(headers, rows);
      if (stats.length > 0) {
        parts.push(`Column statistics (${records.length} records):\n${formatColumnStats(stats)}`);
      }
    }

    return {
      data: { variant: 'json-object', value },
      contentText: this.truncate(parts.join('\n\n')),
    };
  }
}

function isScalar(value: unknown): value is Scalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/** The value as an array of objects with only scalar fields, or null. */
function asFlatRecords(value: unknown): Array<Record<string, Scalar>> | null {
  if (!Array.isArray(value) || value.length === 0) return null;

  const records: Array<Record<string, Scalar>> = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) return null;
    const record: Record<string, Scalar> = {};
    for (const [key, field] of Object.entries(item)) {
      if (!isScalar(field)) return null;
      record[key] = field;
    }
    records.push(record);
  }
  return records;
}

function cellText(value: Scalar | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}
