/**
 * Tests for exposition format negotiation.
 */

import { expect } from 'chai';
import { negotiateFormat } from '../src/metrics/negotiate.js';

const PROTOBUF_ACCEPT =
  'application/vnd.google.protobuf;proto=io.prometheus.client.MetricFamily;encoding=delimited;q=0.7,' +
  'text/plain;version=0.0.4;q=0.3,*/*;q=0.2';

const OPENMETRICS_ACCEPT =
  'application/openmetrics-text;version=1.0.0,application/openmetrics-text;version=0.0.1;q=0.75,' +
  'text/plain;version=0.0.4;q=0.5,*/*;q=0.1';

describe('negotiateFormat', () => {
  it('should default to the text format', () => {
    expect(negotiateFormat(undefined)).to.equal('text');
    expect(negotiateFormat('')).to.equal('text');
    expect(negotiateFormat('*/*')).to.equal('text');
    expect(negotiateFormat('application/json')).to.equal('text');
  });

  it('should pick protobuf for a delimited MetricFamily request', () => {
    expect(negotiateFormat(PROTOBUF_ACCEPT)).to.equal('protobuf');
  });

  it('should pick OpenMetrics when it is preferred', () => {
    expect(negotiateFormat(OPENMETRICS_ACCEPT)).to.equal('openmetrics');
    expect(negotiateFormat('Application/OpenMetrics-Text; Version=1.0.0')).to.equal('openmetrics');
  });

  it('should ignore parameters it does not know', () => {
    const accept = 'application/openmetrics-text;version=1.0.0;escaping=underscores;q=0.5,text/plain;version=0.0.4;q=0.4';

    expect(negotiateFormat(accept)).to.equal('openmetrics');
  });

  it('should honour weights', () => {
    const accept = 'application/openmetrics-text;version=1.0.0;q=0.5,text/plain;version=0.0.4;q=0.9';

    expect(negotiateFormat(accept)).to.equal('text');
    expect(negotiateFormat('application/openmetrics-text;q=0')).to.equal('text');
  });

  it('should skip protobuf without the delimited encoding and unknown versions', () => {
    expect(negotiateFormat('application/vnd.google.protobuf;proto=io.prometheus.client.MetricFamily')).to.equal('text');
    expect(negotiateFormat('application/openmetrics-text;version=2.0.0')).to.equal('text');
  });
});
