import assert from 'node:assert/strict';
import http from 'node:http';
import { once } from 'node:events';
import { after, before, beforeEach, test } from 'node:test';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { TimeSeriesClient } from '../client';
import { SeriesClientError } from '../errors';

interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}

const series = {
  uniqueId: 'a1b2c3',
  identifier: 'Stage.Working@Gauge01',
  type: 'basic',
  unit: 'm',
  utcOffset: null
};

const recordedRequests: RecordedRequest[] = [];
let baseUrl = '';
let server: http.Server;

before(async () => {
  server = http.createServer(async (req, res) => {
    if (!req.url || !req.method) {
      res.statusCode = 400;
      res.end();
      return;
    }
    const text = await readBody(req);
    recordedRequests.push({
      method: req.method,
      url: req.url,
      headers: req.headers,
      body: text.length > 0 ? JSON.parse(text) : null
    });

    const url = new URL(req.url, 'http://localhost');

    if (url.pathname === '/v1/series/resolve' && req.method === 'GET') {
      const identifier = url.searchParams.get('identifier');
      if (identifier === series.identifier || identifier === series.uniqueId) {
        sendJson(res, 200, { data: series });
        return;
      }
      if (identifier === 'Stage@Ambiguous') {
        sendJson(res, 409, { error: { code: 'AMBIGUOUS', message: 'Identifier matches 2 series' } });
        return;
      }
      sendJson(res, 404, { error: { code: 'NOT_FOUND', message: `Series ${identifier} not found` } });
      return;
    }

    if (url.pathname === '/v1/series' && req.method === 'POST') {
      sendJson(res, 201, { data: { ...series, uniqueId: 'created-1', identifier: 'Stage.New@Gauge01' } });
      return;
    }

    if (url.pathname === '/v1/series/a1b2c3/points' && req.method === 'GET') {
      sendJson(res, 200, {
        data: {
          uniqueId: 'a1b2c3',
          points: [
            { time: '2024-01-01T00:00:00.000Z', value: 1.5, gradeCode: 10, qualifiers: ['EST'] },
            { time: '2024-01-01T00:15:00.000Z', type: 'gap' }
          ]
        }
      });
      return;
    }

    if (url.pathname === '/v1/series/a1b2c3/appends' && req.method === 'POST') {
      sendJson(res, 202, { data: { appendRequestId: 'append-1' } });
      return;
    }

    if (url.pathname === '/v1/series/a1b2c3/appends/reflected' && req.method === 'POST') {
      sendJson(res, 202, { data: { appendRequestId: 'append-2' } });
      return;
    }

    if (url.pathname === '/v1/appends/append-1' && req.method === 'GET') {
      sendJson(res, 200, { data: { appendRequestId: 'append-1', status: 'completed', numberOfPointsAppended: 2 } });
      return;
    }

    if (url.pathname === '/v1/appends/broken' && req.method === 'GET') {
      sendJson(res, 200, { appendRequestId: 'broken' });
      return;
    }

    if (url.pathname === '/v1/appends/slow' && req.method === 'GET') {
      setTimeout(() => {
        sendJson(res, 200, { data: { appendRequestId: 'slow', status: 'pending' } });
      }, 300);
      return;
    }

    if (url.pathname === '/v1/appends/plain-error' && req.method === 'GET') {
      res.statusCode = 502;
      res.end('upstream unavailable');
      return;
    }

    res.statusCode = 404;
    res.end();
  });

  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  assert.ok(address && typeof address === 'object');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  server.close();
  await once(server, 'close');
});

beforeEach(() => {
  recordedRequests.length = 0;
});

function createClient(): TimeSeriesClient {
  return new TimeSeriesClient({ baseUrl, token: 'test-secret', userAgent: 'pointforge-test/1.0' });
}

test('resolveSeries sends the identifier and bearer token', async () => {
  const description = await createClient().resolveSeries('Stage.Working@Gauge01');

  assert.equal(description.uniqueId, 'a1b2c3');
  assert.equal(description.type, 'basic');
  assert.equal(recordedRequests.length, 1);
  assert.equal(recordedRequests[0].url, '/v1/series/resolve?identifier=Stage.Working%40Gauge01');
  assert.equal(recordedRequests[0].headers.authorization, 'Bearer test-secret');
  assert.equal(recordedRequests[0].headers['user-agent'], 'pointforge-test/1.0');
});

test('resolveSeries surfaces not found and ambiguous responses', async () => {
  const client = createClient();

  await assert.rejects(client.resolveSeries('Missing@Nowhere'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.statusCode, 404);
    assert.equal(err.code, 'NOT_FOUND');
    assert.equal(err.isNotFound, true);
    assert.equal(err.message, 'Series Missing@Nowhere not found');
    return true;
  });

  await assert.rejects(client.resolveSeries('Stage@Ambiguous'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.statusCode, 409);
    assert.equal(err.code, 'AMBIGUOUS');
    return true;
  });
});

test('createSeries posts the creation payload', async () => {
  const created = await createClient().createSeries({
    identifier: 'Stage.New@Gauge01',
    type: 'reflected',
    unit: 'm',
    gapTolerance: 'PT1H'
  });

  assert.equal(created.uniqueId, 'created-1');
  assert.deepEqual(recordedRequests[0].body, {
    identifier: 'Stage.New@Gauge01',
    type: 'reflected',
    unit: 'm',
    gapTolerance: 'PT1H',
    publish: false
  });
});

test('createSeries sends descriptive fields and extended attributes', async () => {
  await createClient().createSeries({
    identifier: 'Stage.New@Gauge01',
    type: 'basic',
    publish: true,
    comment: 'Installed 2024',
    method: 'Pressure transducer',
    computationIdentifier: 'Mean',
    computationPeriodIdentifier: 'Daily',
    subLocationIdentifier: 'Left bank',
    extendedAttributes: [{ columnIdentifier: 'SENSOR@TS_EXTENSION', value: 'PT-1' }]
  });

  assert.deepEqual(recordedRequests[0].body, {
    identifier: 'Stage.New@Gauge01',
    type: 'basic',
    publish: true,
    comment: 'Installed 2024',
    method: 'Pressure transducer',
    computationIdentifier: 'Mean',
    computationPeriodIdentifier: 'Daily',
    subLocationIdentifier: 'Left bank',
    extendedAttributes: [{ columnIdentifier: 'SENSOR@TS_EXTENSION', value: 'PT-1' }]
  });
});

test('getSeriesPoints passes the query bounds and defaults the point type', async () => {
  const points = await createClient().getSeriesPoints('a1b2c3', { from: '2024-01-01T00:00:00.000Z' });

  assert.equal(recordedRequests[0].url, '/v1/series/a1b2c3/points?from=2024-01-01T00%3A00%3A00.000Z');
  assert.equal(points.length, 2);
  assert.equal(points[0].type, 'point');
  assert.equal(points[0].value, 1.5);
  assert.deepEqual(points[0].qualifiers, ['EST']);
  assert.equal(points[1].type, 'gap');
});

test('appendPoints posts points with the overwrite range', async () => {
  const client = createClient();
  const response = await client.appendPoints(
    'a1b2c3',
    [{ time: '2024-01-01T00:00:00.000Z', type: 'point', value: 4 }],
    { overwriteRange: { start: '2024-01-01T00:00:00.000Z', end: '2024-01-02T00:00:00.000Z' } }
  );

  assert.equal(response.appendRequestId, 'append-1');
  assert.equal(recordedRequests[0].method, 'POST');
  assert.equal(recordedRequests[0].headers['content-type'], 'application/json');
  assert.deepEqual(recordedRequests[0].body, {
    points: [{ time: '2024-01-01T00:00:00.000Z', type: 'point', value: 4 }],
    overwriteRange: { start: '2024-01-01T00:00:00.000Z', end: '2024-01-02T00:00:00.000Z' }
  });

  const reflected = await client.appendPoints('a1b2c3', [], { reflected: true });
  assert.equal(reflected.appendRequestId, 'append-2');
  assert.equal(recordedRequests[1].url, '/v1/series/a1b2c3/appends/reflected');
  assert.deepEqual(recordedRequests[1].body, { points: [], overwriteRange: null });
});

test('getAppendStatus fills in default counts', async () => {
  const status = await createClient().getAppendStatus('append-1');
  assert.deepEqual(status, {
    appendRequestId: 'append-1',
    status: 'completed',
    numberOfPointsAppended: 2,
    numberOfPointsDeleted: 0
  });
});

test('responses that do not match the schema are rejected', async () => {
  await assert.rejects(createClient().getAppendStatus('broken'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.code, 'INVALID_RESPONSE');
    assert.equal(err.message, 'Unexpected response to GET /v1/appends/broken');
    return true;
  });
});

test('non-JSON error bodies keep the status code', async () => {
  await assert.rejects(createClient().getAppendStatus('plain-error'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.statusCode, 502);
    assert.equal(err.code, null);
    assert.equal(err.details, 'upstream unavailable');
    return true;
  });
});

test('unreachable servers raise an UNREACHABLE error', async () => {
  const client = new TimeSeriesClient({ baseUrl: 'http://127.0.0.1:1' });
  await assert.rejects(client.resolveSeries('Stage.Working@Gauge01'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.statusCode, 0);
    assert.equal(err.code, 'UNREACHABLE');
    return true;
  });
});

test('requests that outlive the fetch timeout raise a TIMEOUT error', async () => {
  const client = new TimeSeriesClient({ baseUrl, fetchTimeoutMs: 50 });
  await assert.rejects(client.getAppendStatus('slow'), (err: unknown) => {
    assert.ok(err instanceof SeriesClientError);
    assert.equal(err.code, 'TIMEOUT');
    assert.equal(err.message, 'Request timed out after 50 ms');
    return true;
  });
});

test('a blank token sends no authorization header', async () => {
  const client = new TimeSeriesClient({ baseUrl, token: '   ' });
  await client.getAppendStatus('append-1');
  assert.equal(recordedRequests.length, 1);
  assert.equal(recordedRequests[0]?.headers.authorization, undefined);
});
