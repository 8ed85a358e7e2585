import { createValuePoint, normalizeQualifiers } from './points';
import type { GradeMapping, Instant, Point, QualifierMapping, TransformOptions, ValuePoint } from './types';

export function stripMetadata(point: ValuePoint, options: { grades: boolean; qualifiers: boolean }): ValuePoint {
  if (!options.grades && !options.qualifiers) {
    return point;
  }
  return createValuePoint(point.time, point.value, {
    gradeCode: options.grades ? undefined : point.gradeCode,
    qualifiers: options.qualifiers ? [] : point.qualifiers
  });
}

export function mapGrade(gradeCode: number | undefined, mapping: GradeMapping): number | undefined {
  const mapped =
    gradeCode !== undefined && mapping.entries.has(gradeCode)
      ? mapping.entries.get(gradeCode)
      : mapping.defaultGrade;
  return mapped ?? undefined;
}

/**
 * Listed qualifiers map independently; unlisted ones are replaced by the default list when one
 * exists and kept otherwise. A point without qualifiers takes the default list.
 */
export function mapQualifiers(qualifiers: readonly string[], mapping: QualifierMapping): string[] {
  if (qualifiers.length === 0) {
    return normalizeQualifiers(mapping.defaultQualifiers ?? []);
  }

  const mapped: string[] = [];
  for (const qualifier of qualifiers) {
    if (mapping.entries.has(qualifier)) {
      const target = mapping.entries.get(qualifier);
      if (target) {
        mapped.push(target);
      }
      continue;
    }
    if (mapping.defaultQualifiers) {
      mapped.push(...mapping.defaultQualifiers);
      continue;
    }
    mapped.push(qualifier);
  }
  return normalizeQualifiers(mapped);
}

export function realignPoints(points: readonly Point[], startTime: Instant): Point[] {
  const first = points[0];
  if (!first) {
    return [];
  }
  const shift = startTime - first.time;
  if (shift === 0) {
    return [...points];
  }
  return points.map((point) => ({ ...point, time: point.time + shift }));
}

/**
 * Drops value points sharing the time of the previous retained value point. Gaps always pass.
 */
export function removeDuplicatePoints(points: readonly Point[]): Point[] {
  const result: Point[] = [];
  let previousValueTime: Instant | undefined;
  for (const point of points) {
    if (point.kind === 'value') {
      if (point.time === previousValueTime) {
        continue;
      }
      previousValueTime = point.time;
    }
    result.push(point);
  }
  return result;
}

function remapMetadata(point: Point, options: TransformOptions): Point {
  if (point.kind === 'gap') {
    return point;
  }

  let result = stripMetadata(point, { grades: options.ignoreGrades, qualifiers: options.ignoreQualifiers });

  if (options.gradeMapping) {
    result = createValuePoint(result.time, result.value, {
      gradeCode: mapGrade(result.gradeCode, options.gradeMapping),
      qualifiers: result.qualifiers
    });
  }

  if (options.qualifierMapping) {
    result = createValuePoint(result.time, result.value, {
      gradeCode: result.gradeCode,
      qualifiers: mapQualifiers(result.qualifiers, options.qualifierMapping)
    });
  }

  return result;
}

/**
 * Ignore flags, grade mapping, qualifier mapping, realignment, then deduplication.
 * Input order is preserved; nothing here sorts.
 */
export function transformPoints(points: Iterable<Point>, options: TransformOptions): Point[] {
  let result: Point[] = [];
  for (const point of points) {
    result.push(remapMetadata(point, options));
  }

  if (options.realignTo !== undefined) {
    result = realignPoints(result, options.realignTo);
  }

  if (options.removeDuplicates) {
    result = removeDuplicatePoints(result);
  }

  return result;
}
