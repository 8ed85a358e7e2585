import assert from 'node:assert/strict';
import { resolve } from 'node:path';
import { test } from 'node:test';
import { ConfigurationError } from '@pointforge/points';
import { expandOptionFiles, parseOptionsFileText, splitOptionLine } from '../optionsFile';

function memoryFiles(files: Record<string, string>) {
  const reads: string[] = [];
  const read = async (path: string): Promise<string> => {
    reads.push(path);
    const text = files[path];
    if (text === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return text;
  };
  return { read, reads };
}

test('splitOptionLine separates a flag from its value', () => {
  assert.deepEqual(splitOptionLine('--server   series.test'), ['--server', 'series.test']);
  assert.deepEqual(splitOptionLine('--description=Daily stage'), ['--description=Daily stage']);
  assert.deepEqual(splitOptionLine('--json'), ['--json']);
  assert.deepEqual(splitOptionLine('Stage.Working@Gauge01'), ['Stage.Working@Gauge01']);
});

test('parseOptionsFileText skips blanks and comments', () => {
  const text = ['# connection', '--server series.test', '', '  // target', 'Stage@Gauge01', '12.5'].join('\r\n');
  assert.deepEqual(parseOptionsFileText(text), ['--server', 'series.test', 'Stage@Gauge01', '12.5']);
});

test('option files expand in place and may nest', async () => {
  const outer = resolve('outer.opts');
  const inner = resolve('inner.opts');
  const files = memoryFiles({
    [outer]: '--server series.test\n@inner.opts\n',
    [inner]: '--token test-secret\n'
  });

  const args = await expandOptionFiles(['append', '@outer.opts', '5'], files.read);

  assert.deepEqual(args, ['append', '--server', 'series.test', '--token', 'test-secret', '5']);
  assert.deepEqual(files.reads, [outer, inner]);
});

test('a lone @ is kept as an argument', async () => {
  assert.deepEqual(await expandOptionFiles(['@'], memoryFiles({}).read), ['@']);
});

test('an options file that includes itself is rejected', async () => {
  const loop = resolve('loop.opts');
  const files = memoryFiles({ [loop]: '--json\n@loop.opts\n' });

  await assert.rejects(expandOptionFiles(['@loop.opts'], files.read), (err: unknown) => {
    assert.ok(err instanceof ConfigurationError);
    assert.equal(err.message, `Options file '${loop}' includes itself`);
    return true;
  });
});

test('an unreadable options file is a configuration error', async () => {
  const missing = resolve('missing.opts');
  await assert.rejects(expandOptionFiles(['@missing.opts'], memoryFiles({}).read), (err: unknown) => {
    assert.ok(err instanceof ConfigurationError);
    assert.equal(err.message, `Unable to read options file '${missing}': ENOENT: no such file '${missing}'`);
    return true;
  });
});
