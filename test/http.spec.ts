/**
 * Tests for the scrape server: routes, basic auth and the listener.
 */

import { expect } from 'chai';
import { TransportError } from '../src/common/errors.js';
import { resolveConfig } from '../src/config/loader.js';
import type { PartialManualMetricConfig } from '../src/config/types.js';
import { measurementFromConfig } from '../src/metrics/factory.js';
import { OPENMETRICS_CONTENT_TYPE } from '../src/metrics/openmetrics.js';
import { PROTOBUF_CONTENT_TYPE, metricFamilyType } from '../src/metrics/protobuf.js';
import { AUTH_CHALLENGE, credentialsMatch, parseBasicAuth } from '../src/server/auth.js';
import { createMetricServer, type MetricServer } from '../src/server/server.js';

function basic(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

function createServer(raw: PartialManualMetricConfig = {}): MetricServer & { update(line: string): void } {
  const config = resolveConfig({ bind: '127.0.0.1:0', ...raw });
  const measurement = measurementFromConfig(config);
  const server = createMetricServer({ config, measurement });
  return {
    ...server,
    update: line => {
      measurement.update(line);
    },
  };
}

describe('metric routes', () => {
  let server: ReturnType<typeof createServer>;

  beforeEach(() => {
    server = createServer();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should serve the exposition', async () => {
    server.update('3');

    const response = await server.app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).to.equal(200);
    expect(response.headers['content-type']).to.equal('text/plain; version=0.0.4; charset=utf-8');
    expect(response.body).to.equal([
      '# HELP manual_gauge This is my manual gauge',
      '# TYPE manual_gauge gauge',
      'manual_gauge{address="127.0.0.1",port="0"} 3',
      '',
    ].join('\n'));
  });

  it('should reflect updates between scrapes', async () => {
    server.update('3');
    await server.app.inject({ method: 'GET', url: '/metrics' });
    server.update('+2');

    const response = await server.app.inject({ method: 'GET', url: '/metrics' });

    expect(response.body.split('\n')[2]).to.equal('manual_gauge{address="127.0.0.1",port="0"} 5');
  });

  it('should serve the snapshot as JSON', async () => {
    server.update('7');

    const response = await server.app.inject({ method: 'GET', url: '/status' });

    expect(response.statusCode).to.equal(200);
    expect(response.json()).to.deep.equal({
      ok: true,
      data: {
        kind: 'gauge',
        name: 'manual_gauge',
        labels: { address: '127.0.0.1', port: '0' },
        snapshot: { kind: 'gauge', value: 7 },
      },
    });
  });

  it('should return 404 for other paths', async () => {
    const response = await server.app.inject({ method: 'GET', url: '/other' });

    expect(response.statusCode).to.equal(404);
  });
});

describe('content negotiation', () => {
  let server: ReturnType<typeof createServer>;

  beforeEach(() => {
    server = createServer({
      metric: { type: 'histogram' },
      histogram: { types: 'native', native: { bucketFactor: 2 } },
    });
    for (const value of ['1', '2', '6']) {
      server.update(value);
    }
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should serve native buckets as protobuf', async () => {
    const response = await server.app.inject({
      method: 'GET',
      url: '/metrics',
      headers: {
        accept: 'application/vnd.google.protobuf;proto=io.prometheus.client.MetricFamily;encoding=delimited;q=0.7,' +
          'text/plain;version=0.0.4;q=0.3,*/*;q=0.2',
      },
    });

    expect(response.statusCode).to.equal(200);
    expect(response.headers['content-type']).to.equal(PROTOBUF_CONTENT_TYPE);

    const type = metricFamilyType();
    const family = type.toObject(type.decodeDelimited(response.rawPayload), { longs: Number, enums: String });
    const [metric] = family.metric;
    expect(family.name).to.equal('http_request_seconds');
    expect(family.type).to.equal('HISTOGRAM');
    expect(metric.label).to.deep.equal([
      { name: 'address', value: '127.0.0.1' },
      { name: 'port', value: '0' },
    ]);
    expect(metric.histogram.sampleCount).to.equal(3);
    expect(metric.histogram.sampleSum).to.equal(9);
    expect(metric.histogram.schema).to.equal(0);
    expect(metric.histogram.positiveSpan).to.deep.equal([{ offset: 0, length: 4 }]);
    expect(metric.histogram.positiveDelta).to.deep.equal([1, 0, -1, 1]);
  });

  it('should serve OpenMetrics when asked', async () => {
    const response = await server.app.inject({
      method: 'GET',
      url: '/metrics',
      headers: { accept: 'application/openmetrics-text;version=1.0.0,text/plain;version=0.0.4;q=0.5' },
    });

    expect(response.statusCode).to.equal(200);
    expect(response.headers['content-type']).to.equal(OPENMETRICS_CONTENT_TYPE);
    const lines = response.body.split('\n');
    expect(lines.slice(0, 6)).to.deep.equal([
      '# HELP http_request_seconds This is a histogram with manually selected parameters',
      '# TYPE http_request_seconds histogram',
      'http_request_seconds_bucket{address="127.0.0.1",port="0",le="+Inf"} 3',
      'http_request_seconds_sum{address="127.0.0.1",port="0"} 9.0',
      'http_request_seconds_count{address="127.0.0.1",port="0"} 3',
      lines[5],
    ]);
    expect(lines[5]).to.match(/^http_request_seconds_created\{address="127\.0\.0\.1",port="0"\} \S+$/);
    expect(lines.slice(6)).to.deep.equal(['# EOF', '']);
  });

  it('should fall back to the text format', async () => {
    const response = await server.app.inject({
      method: 'GET',
      url: '/metrics',
      headers: { accept: 'application/json' },
    });

    expect(response.headers['content-type']).to.equal('text/plain; version=0.0.4; charset=utf-8');
    expect(response.body).to.include('http_request_seconds_count{address="127.0.0.1",port="0"} 3\n');
  });
});

describe('custom metrics path', () => {
  it('should serve the exposition at the configured path only', async () => {
    const server = createServer({ metricsPath: '/scrape' });
    try {
      const scrape = await server.app.inject({ method: 'GET', url: '/scrape' });
      const old = await server.app.inject({ method: 'GET', url: '/metrics' });

      expect(scrape.statusCode).to.equal(200);
      expect(old.statusCode).to.equal(404);
    } finally {
      await server.stop();
    }
  });
});

describe('basic auth', () => {
  let server: ReturnType<typeof createServer>;

  beforeEach(() => {
    server = createServer({ auth: { username: 'admin', password: 'test-secret' } });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should challenge a request without credentials', async () => {
    const response = await server.app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).to.equal(401);
    expect(response.headers['www-authenticate']).to.equal(AUTH_CHALLENGE);
    expect(response.headers['content-type']).to.equal('text/plain; charset=utf-8');
    expect(response.body).to.equal('Unauthorized\n');
  });

  it('should reject wrong credentials', async () => {
    const wrongPassword = await server.app.inject({
      method: 'GET',
      url: '/metrics',
      headers: { authorization: basic('admin', 'wrong') },
    });
    const wrongUser = await server.app.inject({
      method: 'GET',
      url: '/status',
      headers: { authorization: basic('root', 'test-secret') },
    });

    expect(wrongPassword.statusCode).to.equal(401);
    expect(wrongUser.statusCode).to.equal(401);
  });

  it('should accept matching credentials', async () => {
    const response = await server.app.inject({
      method: 'GET',
      url: '/metrics',
      headers: { authorization: basic('admin', 'test-secret') },
    });

    expect(response.statusCode).to.equal(200);
    expect(response.body).to.include('# TYPE manual_gauge gauge\n');
  });

  it('should stay off when only a username is configured', async () => {
    const open = createServer({ auth: { username: 'admin' } });
    try {
      const response = await open.app.inject({ method: 'GET', url: '/metrics' });
      expect(response.statusCode).to.equal(200);
    } finally {
      await open.stop();
    }
  });
});

describe('parseBasicAuth', () => {
  it('should decode credentials', () => {
    expect(parseBasicAuth(basic('admin', 'a:b'))).to.deep.equal({ username: 'admin', password: 'a:b' });
    expect(parseBasicAuth(`basic ${Buffer.from('u:p').toString('base64')}`)).to.deep.equal({
      username: 'u',
      password: 'p',
    });
  });

  it('should ignore other schemes and malformed values', () => {
    expect(parseBasicAuth(undefined)).to.equal(undefined);
    expect(parseBasicAuth('Bearer test-token')).to.equal(undefined);
    expect(parseBasicAuth('Basic !!!')).to.equal(undefined);
    expect(parseBasicAuth(`Basic ${Buffer.from('nocolon').toString('base64')}`)).to.equal(undefined);
  });
});

describe('credentialsMatch', () => {
  it('should compare both fields', () => {
    const expected = { username: 'admin', password: 'test-secret' };

    expect(credentialsMatch({ username: 'admin', password: 'test-secret' }, expected)).to.equal(true);
    expect(credentialsMatch({ username: 'admin', password: 'test-secre' }, expected)).to.equal(false);
    expect(credentialsMatch({ username: 'Admin', password: 'test-secret' }, expected)).to.equal(false);
  });
});

describe('listener', () => {
  it('should serve scrapes over a real socket', async () => {
    const server = createServer({ metric: { type: 'counter' } });
    try {
      const address = await server.start();
      server.update('1');
      server.update('1');

      const response = await fetch(`${address}/metrics`);
      const body = await response.text();

      expect(response.status).to.equal(200);
      expect(body).to.include('# TYPE manual_counter_total counter\n');
      expect(body).to.match(/^manual_counter_total\{address="127\.0\.0\.1",port="\d+"\} 2$/m);
    } finally {
      await server.stop();
    }
  });

  it('should raise a TransportError when the port is taken', async () => {
    const first = createServer();
    await first.start();
    const bound = first.app.server.address();
    const port = typeof bound === 'object' && bound !== null ? bound.port : 0;
    const second = createServer({ bind: `127.0.0.1:${port}` });

    let caught: unknown;
    try {
      await second.start();
    } catch (err) {
      caught = err;
    } finally {
      await second.stop();
      await first.stop();
    }

    expect(port).to.be.greaterThan(0);
    expect(caught).to.be.instanceOf(TransportError);
    if (caught instanceof TransportError) {
      expect(caught.message).to.match(new RegExp(`^Failed to listen on 127\\.0\\.0\\.1:${port}: `));
    }
  });
});
