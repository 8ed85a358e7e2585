import assert from 'node:assert/strict';
import { test } from 'node:test';
import { buildGradeMapping, buildQualifierMapping } from '../mappings';
import { createGapPoint, createValuePoint } from '../points';
import { mapGrade, mapQualifiers, realignPoints, removeDuplicatePoints, transformPoints } from '../transform';
import type { TransformOptions } from '../types';

const NO_TRANSFORM: TransformOptions = { ignoreGrades: false, ignoreQualifiers: false, removeDuplicates: false };

test('mapGrade maps listed grades and leaves unlisted ones without a default ungraded', () => {
  const mapping = buildGradeMapping(['200,299:5']);
  assert.ok(mapping);
  assert.equal(mapGrade(250, mapping), 5);
  assert.equal(mapGrade(100, mapping), undefined);
  assert.equal(mapGrade(undefined, mapping), undefined);
});

test('mapGrade applies the default to unlisted and missing grades', () => {
  const mapping = buildGradeMapping(['1:2', ':9', '3:']);
  assert.ok(mapping);
  assert.equal(mapGrade(1, mapping), 2);
  assert.equal(mapGrade(7, mapping), 9);
  assert.equal(mapGrade(undefined, mapping), 9);
  assert.equal(mapGrade(3, mapping), undefined);
});

test('mapQualifiers maps each qualifier independently', () => {
  const mapping = buildQualifierMapping(['A:B']);
  assert.ok(mapping);
  assert.deepEqual(mapQualifiers(['A', 'C'], mapping), ['B', 'C']);
});

test('mapQualifiers replaces unmatched qualifiers with the default list', () => {
  const mapping = buildQualifierMapping(['A:B', ':EST']);
  assert.ok(mapping);
  assert.deepEqual(mapQualifiers(['A', 'C'], mapping), ['B', 'EST']);
  assert.deepEqual(mapQualifiers([], mapping), ['EST']);
});

test('mapQualifiers removes qualifiers mapped to nothing and de-duplicates', () => {
  const mapping = buildQualifierMapping(['A:', 'B:C']);
  assert.ok(mapping);
  assert.deepEqual(mapQualifiers(['A', 'B', 'C'], mapping), ['C']);
});

test('removeDuplicatePoints keeps the first value at a repeated time', () => {
  const result = removeDuplicatePoints([createValuePoint(10, 1), createValuePoint(10, 2), createValuePoint(20, 3)]);
  assert.deepEqual(result, [createValuePoint(10, 1), createValuePoint(20, 3)]);
});

test('removeDuplicatePoints lets gaps through at a value time', () => {
  const result = removeDuplicatePoints([createValuePoint(10, 1), createGapPoint(10), createValuePoint(10, 2)]);
  assert.deepEqual(result, [createValuePoint(10, 1), createGapPoint(10)]);
});

test('realignPoints shifts every point and keeps the spacing', () => {
  const result = realignPoints([createValuePoint(1_000, 1), createGapPoint(1_500), createValuePoint(3_000, 2)], 5_000);
  assert.deepEqual(
    result.map((point) => point.time),
    [5_000, 5_500, 7_000]
  );
  assert.deepEqual(realignPoints([], 5_000), []);
});

test('ignore flags strip metadata before mapping', () => {
  const gradeMapping = buildGradeMapping([':7']);
  const result = transformPoints([createValuePoint(0, 1, { gradeCode: 3, qualifiers: ['A'] })], {
    ...NO_TRANSFORM,
    ignoreGrades: true,
    ignoreQualifiers: true,
    gradeMapping
  });
  assert.deepEqual(result, [createValuePoint(0, 1, { gradeCode: 7 })]);
});

test('transformPoints applies mappings, realignment and deduplication in order', () => {
  const result = transformPoints(
    [
      createValuePoint(100, 1, { gradeCode: 250, qualifiers: ['A', 'C'] }),
      createValuePoint(100, 2, { gradeCode: 100 }),
      createGapPoint(150),
      createValuePoint(200, 3, { gradeCode: 260, qualifiers: ['A'] })
    ],
    {
      ...NO_TRANSFORM,
      gradeMapping: buildGradeMapping(['200,299:5']),
      qualifierMapping: buildQualifierMapping(['A:B']),
      realignTo: 1_000,
      removeDuplicates: true
    }
  );

  assert.deepEqual(result, [
    createValuePoint(1_000, 1, { gradeCode: 5, qualifiers: ['B', 'C'] }),
    createGapPoint(1_050),
    createValuePoint(1_100, 3, { gradeCode: 5, qualifiers: ['B'] })
  ]);
});

test('transformPoints without options returns the input unchanged', () => {
  const input = [createValuePoint(0, 1, { gradeCode: 1, qualifiers: ['X'] }), createGapPoint(1)];
  assert.deepEqual(transformPoints(input, NO_TRANSFORM), input);
});
