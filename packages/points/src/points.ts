import type { GapPoint, Instant, Point, ValuePoint } from './types';

export function normalizeQualifiers(qualifiers: Iterable<string>): string[] {
  const result: string[] = [];
  const seen = new Set<string>();
  for (const raw of qualifiers) {
    const qualifier = raw.trim();
    if (qualifier.length === 0 || seen.has(qualifier)) {
      continue;
    }
    seen.add(qualifier);
    result.push(qualifier);
  }
  return result;
}

export function createValuePoint(
  time: Instant,
  value: number,
  metadata: { gradeCode?: number | null; qualifiers?: Iterable<string> | null } = {}
): ValuePoint {
  const point: ValuePoint = {
    kind: 'value',
    time,
    value,
    qualifiers: normalizeQualifiers(metadata.qualifiers ?? [])
  };
  if (metadata.gradeCode !== undefined && metadata.gradeCode !== null) {
    point.gradeCode = metadata.gradeCode;
  }
  return point;
}

export function createGapPoint(time: Instant): GapPoint {
  return { kind: 'gap', time };
}

export function isValuePoint(point: Point): point is ValuePoint {
  return point.kind === 'value';
}
