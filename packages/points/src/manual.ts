import { createGapPoint, createValuePoint } from './points';
import type { ManualPointsSpec, Point } from './types';

/**
 * One point per literal, in argument order. The clock advances after every literal, gaps included.
 */
export function collectManualPoints(spec: ManualPointsSpec): Point[] {
  const points: Point[] = [];
  let clock = spec.startTime;
  for (const literal of spec.literals) {
    points.push(
      literal === 'gap'
        ? createGapPoint(clock)
        : createValuePoint(clock, literal, { gradeCode: spec.gradeCode, qualifiers: spec.qualifiers })
    );
    clock += spec.intervalMs;
  }
  return points;
}
