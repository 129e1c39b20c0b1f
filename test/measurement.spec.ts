/**
 * Tests for the measurement core.
 */

import { expect } from 'chai';
import { ConfigurationError, ParseError } from '../src/common/errors.js';
import {
  CounterMeasurement,
  GaugeMeasurement,
  HistogramMeasurement,
  createMeasurement,
  parseHistogramTypes,
  parseMetricKind,
} from '../src/metrics/measurement.js';
import { DEFAULT_BUCKETS, type MetricDescriptor } from '../src/metrics/types.js';

const descriptor: MetricDescriptor = {
  namespace: 'test',
  name: 'metric',
  help: 'A test metric',
  constLabels: { address: '0.0.0.0', port: '5001' },
};

describe('Measurement', () => {
  describe('Gauge', () => {
    let gauge: GaugeMeasurement;

    beforeEach(() => {
      gauge = createMeasurement({ kind: 'gauge', descriptor });
    });

    it('should start at zero', () => {
      expect(gauge.snapshot()).to.deep.equal({ kind: 'gauge', value: 0 });
    });

    it('should set the parsed value', () => {
      for (const input of ['12.5', '-3', '0', '1e6']) {
        const result = gauge.update(input);
        expect(result.ok).to.be.true;
        expect(gauge.snapshot().value).to.equal(Number(input));
      }
    });

    it('should add values prefixed with +', () => {
      gauge.update('10');
      gauge.update('+5');
      expect(gauge.snapshot().value).to.equal(15);
    });

    it('should return to the original value after adding and removing', () => {
      gauge.update('2.5');
      gauge.update('+5');
      gauge.update('+-5');
      expect(gauge.snapshot().value).to.equal(2.5);
    });

    it('should leave the value unchanged on malformed input', () => {
      gauge.update('4');
      for (const input of ['abc', '', ' ', '+', '++x']) {
        const result = gauge.update(input);
        expect(result.ok, input).to.be.false;
        if (!result.ok) {
          expect(result.error).to.be.instanceOf(ParseError);
        }
      }
      expect(gauge.snapshot().value).to.equal(4);
    });

    it('should report the parsed value and the new snapshot', () => {
      gauge.update('1');
      const result = gauge.update('+2');
      expect(result).to.deep.equal({ ok: true, value: 2, snapshot: { kind: 'gauge', value: 3 } });
    });

    it('should return frozen snapshots that do not track later updates', () => {
      const before = gauge.snapshot();
      gauge.update('9');
      expect(Object.isFrozen(before)).to.be.true;
      expect(before.value).to.equal(0);
    });
  });

  describe('Counter', () => {
    let counter: CounterMeasurement;

    beforeEach(() => {
      counter = createMeasurement({ kind: 'counter', descriptor });
    });

    it('should increment by one per accepted input regardless of the number', () => {
      counter.update('1');
      counter.update('-7');
      counter.update('100');
      expect(counter.snapshot()).to.deep.equal({ kind: 'counter', value: 3 });
    });

    it('should not increment on malformed input', () => {
      counter.update('5');
      const result = counter.update('five');
      expect(result.ok).to.be.false;
      expect(counter.snapshot().value).to.equal(1);
    });

    it('should never decrease', () => {
      let previous = counter.snapshot().value;
      for (const input of ['-1', 'x', '-100', '0', '', '+3']) {
        counter.update(input);
        const current = counter.snapshot().value;
        expect(current).to.be.at.least(previous);
        previous = current;
      }
      expect(previous).to.equal(4);
    });
  });

  describe('Histogram', () => {
    let histogram: HistogramMeasurement;

    beforeEach(() => {
      histogram = createMeasurement({ kind: 'histogram', descriptor, buckets: [1, 10, 100] });
    });

    it('should count an observation in every bucket at or above it', () => {
      histogram.update('5');
      const snapshot = histogram.snapshot();
      expect(snapshot.buckets).to.deep.equal([
        { le: 1, count: 0 },
        { le: 10, count: 1 },
        { le: 100, count: 1 },
      ]);
      expect(snapshot.count).to.equal(1);
      expect(snapshot.sum).to.equal(5);
    });

    it('should count values above every bound only in sum and count', () => {
      histogram.update('1000');
      const snapshot = histogram.snapshot();
      expect(snapshot.buckets.map(b => b.count)).to.deep.equal([0, 0, 0]);
      expect(snapshot.count).to.equal(1);
      expect(snapshot.sum).to.equal(1000);
    });

    it('should include a value equal to a bound in that bucket', () => {
      histogram.update('1');
      expect(histogram.snapshot().buckets[0]).to.deep.equal({ le: 1, count: 1 });
    });

    it('should accept negative observations', () => {
      histogram.update('-3');
      const snapshot = histogram.snapshot();
      expect(snapshot.buckets.map(b => b.count)).to.deep.equal([1, 1, 1]);
      expect(snapshot.sum).to.equal(-3);
    });

    it('should keep bucket counts cumulative', () => {
      for (const input of ['0.5', '50', '7', '200', '1', '99', '-1']) {
        histogram.update(input);
      }
      const { buckets, count } = histogram.snapshot();
      expect(buckets.map(b => b.count)).to.deep.equal([3, 4, 6]);
      for (let i = 1; i < buckets.length; i++) {
        expect(buckets[i].count).to.be.at.least(buckets[i - 1].count);
      }
      expect(count).to.equal(7);
    });

    it('should ignore malformed input', () => {
      histogram.update('5');
      expect(histogram.update('lots').ok).to.be.false;
      expect(histogram.snapshot().count).to.equal(1);
    });

    it('should use the default buckets when none are given', () => {
      const defaults = createMeasurement({ kind: 'histogram', descriptor });
      expect(defaults.bucketBoundaries).to.deep.equal(DEFAULT_BUCKETS);
      expect(defaults.snapshot().native).to.be.undefined;
    });

    it('should have no classic buckets when only native bucketing is requested', () => {
      const native = createMeasurement({
        kind: 'histogram',
        descriptor,
        native: { bucketFactor: 1.1, maxBucketNumber: 100, minResetDuration: 0 },
      });
      expect(native.bucketBoundaries).to.deep.equal([]);
      expect(native.snapshot().native?.schema).to.equal(3);
    });

    it('should drop a trailing +Inf bound', () => {
      const withInf = createMeasurement({ kind: 'histogram', descriptor, buckets: [1, 2, Infinity] });
      expect(withInf.bucketBoundaries).to.deep.equal([1, 2]);
    });
  });

  describe('construction', () => {
    it('should reject bounds that are not strictly increasing', () => {
      expect(() => createMeasurement({ kind: 'histogram', descriptor, buckets: [1, 1] }))
        .to.throw(ConfigurationError, 'strictly increasing');
      expect(() => createMeasurement({ kind: 'histogram', descriptor, buckets: [10, 1] }))
        .to.throw(ConfigurationError, 'strictly increasing');
    });

    it('should reject non-finite bounds', () => {
      expect(() => createMeasurement({ kind: 'histogram', descriptor, buckets: [1, NaN, 3] }))
        .to.throw(ConfigurationError, 'finite');
    });

    it('should reject invalid metric names', () => {
      expect(() => createMeasurement({ kind: 'gauge', descriptor: { ...descriptor, name: 'bad-name' } }))
        .to.throw(ConfigurationError, 'invalid metric name "test_bad-name"');
    });

    it('should reject invalid label names', () => {
      expect(() => createMeasurement({
        kind: 'gauge',
        descriptor: { ...descriptor, constLabels: { __reserved: 'x' } },
      })).to.throw(ConfigurationError, 'invalid label name "__reserved"');
    });

    it('should reserve the le label on histograms', () => {
      expect(() => createMeasurement({
        kind: 'histogram',
        descriptor: { ...descriptor, constLabels: { le: '1' } },
      })).to.throw(ConfigurationError, 'label name "le" is reserved');
    });

    it('should freeze the descriptor', () => {
      const labels = { address: 'a' };
      const gauge = createMeasurement({ kind: 'gauge', descriptor: { ...descriptor, constLabels: labels } });
      labels.address = 'b';
      expect(gauge.descriptor.constLabels).to.deep.equal({ address: 'a' });
      expect(Object.isFrozen(gauge.descriptor.constLabels)).to.be.true;
    });

    it('should create the variant matching the kind', () => {
      expect(createMeasurement({ kind: 'gauge', descriptor })).to.be.instanceOf(GaugeMeasurement);
      expect(createMeasurement({ kind: 'counter', descriptor })).to.be.instanceOf(CounterMeasurement);
      expect(createMeasurement({ kind: 'histogram', descriptor })).to.be.instanceOf(HistogramMeasurement);
    });
  });

  describe('parseMetricKind', () => {
    it('should accept known kinds', () => {
      expect(parseMetricKind('counter')).to.equal('counter');
      expect(parseMetricKind('histogram')).to.equal('histogram');
    });

    it('should reject unknown kinds', () => {
      expect(() => parseMetricKind('summary')).to.throw(ConfigurationError, 'unknown metric type summary');
    });
  });

  describe('parseHistogramTypes', () => {
    it('should parse a comma separated list', () => {
      expect(parseHistogramTypes('classic,native')).to.deep.equal(['classic', 'native']);
      expect(parseHistogramTypes('native, native')).to.deep.equal(['native']);
    });

    it('should reject unknown types', () => {
      expect(() => parseHistogramTypes('classic,sparse'))
        .to.throw(ConfigurationError, 'unknown histogram type sparse');
    });
  });
});
