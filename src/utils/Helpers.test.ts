import { describe, expect, it } from 'vitest';
import { isNumeric, kebabToCamel, parseBoolean, toAttributes } from './Helpers';

describe('Helpers', () => {
    it('converts kebab-case to camelCase', () => {
        expect(kebabToCamel('connect-to')).toBe('connectTo');
        expect(kebabToCamel('tx-bits-per-second')).toBe('txBitsPerSecond');
    });

    it('recognises numbers', () => {
        expect(isNumeric('42')).toBe(true);
        expect(isNumeric('0.5')).toBe(true);
        expect(isNumeric('')).toBe(false);
        expect(isNumeric('*3')).toBe(false);
        expect(isNumeric('-3')).toBe(true);
        expect(isNumeric('10.0.0.5')).toBe(false);
        expect(isNumeric('1e3')).toBe(false);
        expect(isNumeric(' 12 ')).toBe(false);
        expect(isNumeric('0x10')).toBe(false);
        expect(isNumeric('.5')).toBe(false);
    });

    it('parses RouterOS booleans', () => {
        expect(parseBoolean('yes')).toBe(true);
        expect(parseBoolean('false')).toBe(false);
        expect(parseBoolean('maybe')).toBeNull();
    });

    it('prefixes attribute names with the sigil', () => {
        expect(toAttributes({ '.id': '*1', 'connect-to': '10.0.0.5', port: 1194, disabled: false })).toEqual({
            '=.id': '*1',
            '=connect-to': '10.0.0.5',
            '=port': '1194',
            '=disabled': 'false'
        });
    });

    it('keeps names that already carry a sigil', () => {
        expect(toAttributes({ '=name': 'ovpn-out1', '?running': 'false', '.tag': 't1' })).toEqual({
            '=name': 'ovpn-out1',
            '?running': 'false',
            '.tag': 't1'
        });
    });
});
