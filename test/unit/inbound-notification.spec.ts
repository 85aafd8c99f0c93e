import {
  extractNotification,
  parseOrderId,
  readField,
  sanitizeKey,
  sanitizeText,
} from '../../src';

describe('Inbound notification', () => {
  describe('sanitizeText', () => {
    it('should strip tags, collapse whitespace and trim', () => {
      expect(sanitizeText('  <b>VALID</b>\n\t  payment ')).toBe('VALID payment');
    });

    it('should remove control characters', () => {
      expect(sanitizeText('ORDER\u0000-42\u0007')).toBe('ORDER-42');
    });
  });

  describe('sanitizeKey', () => {
    it('should lowercase and keep only [a-z0-9_-]', () => {
      expect(sanitizeKey('Tran_ID')).toBe('tran_id');
      expect(sanitizeKey('val id!')).toBe('valid');
    });
  });

  describe('extractNotification', () => {
    it('should keep strings and string arrays, sanitized', () => {
      const notification = extractNotification({
        Tran_ID: ' ORDER-42-1700000000 ',
        status: '<i>VALID</i>',
        cards: ['visa', 7, ' master '],
      });

      expect(notification).toEqual({
        tran_id: 'ORDER-42-1700000000',
        status: 'VALID',
        cards: ['visa', 'master'],
      });
    });

    it('should stringify numbers and booleans', () => {
      expect(extractNotification({ amount: 1500, risk_level: false })).toEqual({
        amount: '1500',
        risk_level: 'false',
      });
    });

    it('should drop nested objects and null values', () => {
      expect(
        extractNotification({ tran_id: 'T1', card: { brand: 'VISA' }, x: null }),
      ).toEqual({ tran_id: 'T1' });
    });

    it.each([null, undefined, 'tran_id=T1', 42, ['T1']])(
      'should return an empty notification for %p',
      (payload) => {
        expect(extractNotification(payload)).toEqual({});
      },
    );
  });

  describe('readField', () => {
    it('should read strings and treat arrays or absent fields as empty', () => {
      const notification = { tran_id: 'T1', cards: ['visa'] };

      expect(readField(notification, 'tran_id')).toBe('T1');
      expect(readField(notification, 'cards')).toBe('');
      expect(readField(notification, 'val_id')).toBe('');
    });
  });

  describe('parseOrderId', () => {
    it.each([
      ['42', 42],
      ['007', 7],
    ])('should parse %p', (raw, expected) => {
      expect(parseOrderId(raw)).toBe(expected);
    });

    it.each(['', '0', '000', '-1', '4.2', '42abc', ' 42', '1e3', '99999999999999999999'])(
      'should reject %p',
      (raw) => {
        expect(parseOrderId(raw)).toBeNull();
      },
    );
  });
});
