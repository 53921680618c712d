/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';
import sinon from 'sinon';
import { expandVlanRange, intersectVlans, parseVlanId } from '../../../src/shared/parsing/VlanRangeExpander';

describe('VlanRangeExpander', () => {
  describe('parseVlanId', () => {
    it('accepts any plain non-negative integer', () => {
      expect(parseVlanId('10')).to.equal(10);
      expect(parseVlanId(' 4095 ')).to.equal(4095);
      expect(parseVlanId('0')).to.equal(0);
      expect(parseVlanId('4096')).to.equal(4096);
      expect(parseVlanId('9999')).to.equal(9999);
    });

    it('rejects non-numeric and negative tokens', () => {
      expect(parseVlanId('-1')).to.equal(undefined);
      expect(parseVlanId('1a')).to.equal(undefined);
      expect(parseVlanId('')).to.equal(undefined);
    });
  });

  describe('expandVlanRange', () => {
    it('expands singles and inclusive ranges', () => {
      expect(expandVlanRange('10,20,30-33')).to.deep.equal([10, 20, 30, 31, 32, 33]);
    });

    it('returns a sorted, duplicate-free list', () => {
      expect(expandVlanRange('5,10-12,10')).to.deep.equal([5, 10, 11, 12]);
      expect(expandVlanRange('30,1-2,2')).to.deep.equal([1, 2, 30]);
    });

    it('tolerates whitespace and empty entries', () => {
      expect(expandVlanRange(' 1 , 3 - 4 ,, ')).to.deep.equal([1, 3, 4]);
    });

    it('skips malformed entries and keeps the rest', () => {
      expect(expandVlanRange('10,abc,20-x,30')).to.deep.equal([10, 30]);
    });

    it('expands ranges past 4095 without capping', () => {
      expect(expandVlanRange('4094-4097,7')).to.deep.equal([7, 4094, 4095, 4096, 4097]);
    });

    it('yields nothing for a descending range', () => {
      expect(expandVlanRange('20-10')).to.deep.equal([]);
    });

    it('returns an empty list for an empty expression', () => {
      expect(expandVlanRange('')).to.deep.equal([]);
    });

    it('logs skipped entries at debug level', () => {
      const logger = { info: sinon.spy(), warn: sinon.spy(), debug: sinon.spy(), error: sinon.spy() };
      expandVlanRange('1,bad', logger);
      sinon.assert.calledOnceWithExactly(logger.debug, 'Skipping malformed VLAN list entry "bad"');
    });
  });

  describe('intersectVlans', () => {
    it('keeps ids present in both lists', () => {
      expect(intersectVlans([10, 20, 30], [30, 40])).to.deep.equal([30]);
      expect(intersectVlans([10, 20], [30, 40])).to.deep.equal([]);
    });
  });
});
