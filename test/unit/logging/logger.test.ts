/* eslint-env mocha */
/* global describe, it, afterEach */
import { expect } from 'chai';
import sinon from 'sinon';
import { createScopedLogger, getLogLevel, log, setLogLevel } from '../../../src/logging/logger';
import { formatMessage, isLevelEnabled, parseLogLevel } from '../../../src/logging/loggerUtils';

const LINE = /^\d{4}-\d{2}-\d{2}T\S+ (DEBUG|INFO|WARN|ERROR) \S+:\d+ - (.*)$/s;

describe('logger', () => {
  afterEach(() => {
    sinon.restore();
    setLogLevel('info');
  });

  it('writes timestamp, level and caller location', () => {
    const info = sinon.stub(console, 'info');
    log.info('hello');
    sinon.assert.calledOnce(info);
    const match = LINE.exec(String(info.firstCall.args[0]));
    expect(match?.[1]).to.equal('INFO');
    expect(match?.[2]).to.equal('hello');
  });

  it('routes each level to the matching console method', () => {
    const error = sinon.stub(console, 'error');
    const warn = sinon.stub(console, 'warn');
    log.error('bad');
    log.warn('careful');
    expect(String(error.firstCall.args[0])).to.match(/ ERROR \S+ - bad$/);
    expect(String(warn.firstCall.args[0])).to.match(/ WARN \S+ - careful$/);
  });

  it('drops messages below the threshold', () => {
    const debug = sinon.stub(console, 'debug');
    const info = sinon.stub(console, 'info');
    log.debug('hidden');
    sinon.assert.notCalled(debug);

    setLogLevel('warn');
    expect(getLogLevel()).to.equal('warn');
    log.info('also hidden');
    sinon.assert.notCalled(info);

    setLogLevel('debug');
    log.debug('shown');
    sinon.assert.calledOnce(debug);
  });

  it('prefixes scoped logger messages', () => {
    const warn = sinon.stub(console, 'warn');
    createScopedLogger('TopologyStore').warn('disk full');
    expect(String(warn.firstCall.args[0])).to.match(/ - \[TopologyStore\] disk full$/);
  });
});

describe('loggerUtils', () => {
  it('orders levels', () => {
    expect(isLevelEnabled('error', 'warn')).to.equal(true);
    expect(isLevelEnabled('debug', 'info')).to.equal(false);
  });

  it('parses level names', () => {
    expect(parseLogLevel(' WARN ')).to.equal('warn');
    expect(parseLogLevel('verbose')).to.equal(undefined);
  });

  it('formats objects as JSON and errors by stack', () => {
    expect(formatMessage({ a: 1 })).to.equal('{"a":1}');
    expect(formatMessage(42)).to.equal('42');
    const err = new Error('broken');
    expect(formatMessage(err)).to.equal(err.stack);
  });
});
