import type { FlowField, FlowRecord } from "../types.js";

export interface AggregationResult {
  field: FlowField;
  groups: GroupResult[];
  total: number;
}

export interface GroupResult {
  key: string;
  count: number;
  percentage: number;
}

export function groupBy(
  records: readonly FlowRecord[],
  field: FlowField,
  limit = 20,
): AggregationResult {
  const sorted = [...countValues(records, field).entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);

  const total = records.length;

  return {
    field,
    total,
    groups: sorted.map(([key, count]) => ({
      key,
      count,
      percentage: total > 0 ? Math.round((count / total) * 10000) / 100 : 0,
    })),
  };
}

/** Sum of a counter column; non-numeric values are ignored. */
export function sumField(records: readonly FlowRecord[], field: FlowField): number {
  let total = 0;
  for (const record of records) {
    const value = parseInt(record[field], 10);
    if (!isNaN(value)) {
      total += value;
    }
  }
  return total;
}

export function countUnique(records: readonly FlowRecord[], field: FlowField): number {
  return new Set(records.map((record) => record[field])).size;
}

export function topN(
  records: readonly FlowRecord[],
  field: FlowField,
  n = 10,
): Array<{ value: string; count: number }> {
  return [...countValues(records, field).entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, n)
    .map(([value, count]) => ({ value, count }));
}

function countValues(records: readonly FlowRecord[], field: FlowField): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const key = record[field] === "" ? "(empty)" : record[field];
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
