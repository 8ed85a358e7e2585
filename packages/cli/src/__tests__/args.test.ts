import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConfigurationError } from '@pointforge/points';
import { classifyArguments } from '../args';

const files = new Set(['readings.csv', 'stage.xlsx']);
const fileExists = (path: string) => files.has(path);

test('classifies commands, literals, files and the target series', () => {
  const result = classifyArguments(
    ['Stage.Working@Gauge01', 'OVERWRITE', '1.5', 'gap', '-2', '3e2', 'readings.csv', 'stage.xlsx'],
    fileExists
  );

  assert.deepEqual(result, {
    command: 'overwrite',
    literals: [1.5, 'gap', -2, 300],
    csvFiles: ['readings.csv', 'stage.xlsx'],
    timeSeries: 'Stage.Working@Gauge01'
  });
});

test('gap is matched without regard to case', () => {
  assert.deepEqual(classifyArguments(['GAP', '.5'], fileExists).literals, ['gap', 0.5]);
});

test('a second unrecognised argument is rejected', () => {
  assert.throws(
    () => classifyArguments(['Stage@A', 'Stage@B'], fileExists),
    (err: unknown) => err instanceof ConfigurationError && err.message === 'Unknown argument: Stage@B'
  );
});

test('no arguments yields empty collections', () => {
  assert.deepEqual(classifyArguments([], fileExists), { literals: [], csvFiles: [] });
});
