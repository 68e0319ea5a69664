import { createId, errnoCode, isPlainObject, isValidIpv4, tail } from '../../../src/common/utils';

describe('utils', () => {
  describe('createId', () => {
    it('should generate unique identifiers', () => {
      const ids = new Set(Array.from({ length: 50 }, () => createId()));
      expect(ids.size).toBe(50);
    });
  });

  describe('isValidIpv4', () => {
    it('should accept dotted-quad addresses', () => {
      expect(isValidIpv4('172.16.16.1')).toBe(true);
      expect(isValidIpv4('0.0.0.0')).toBe(true);
      expect(isValidIpv4('255.255.255.255')).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isValidIpv4('256.1.1.1')).toBe(false);
      expect(isValidIpv4('10.0.0')).toBe(false);
      expect(isValidIpv4('localhost')).toBe(false);
      expect(isValidIpv4('')).toBe(false);
      expect(isValidIpv4('::1')).toBe(false);
    });
  });

  describe('isPlainObject', () => {
    it('should only accept non-array objects', () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject('a')).toBe(false);
    });
  });

  describe('tail', () => {
    it('should keep the end of long text', () => {
      expect(tail('abcdef', 3)).toBe('def');
      expect(tail('ab', 3)).toBe('ab');
    });
  });

  describe('errnoCode', () => {
    it('should read the code of a system error', () => {
      const error = Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
      expect(errnoCode(error)).toBe('ESRCH');
    });

    it('should ignore values without a string code', () => {
      expect(errnoCode(new Error('plain'))).toBeUndefined();
      expect(errnoCode({ code: 'ESRCH' })).toBeUndefined();
    });
  });
});
