import { describe, expect, it } from 'vitest';
import { AddressResolver, pickAddress, sameAddress } from './AddressResolver';
import { OvpnUpdateError } from './OvpnUpdateError';

describe('pickAddress', () => {
    const addresses = ['2001:db8::10', '203.0.113.9', '2001:db8::11', '203.0.113.10'];

    it('takes the first IPv4 address by default', () => {
        expect(pickAddress(addresses, false)).toBe('203.0.113.9');
    });

    it('takes the first IPv6 address when asked to', () => {
        expect(pickAddress(addresses, true)).toBe('2001:db8::10');
    });

    it('returns null when the family is missing', () => {
        expect(pickAddress(['203.0.113.9'], true)).toBeNull();
        expect(pickAddress([], false)).toBeNull();
    });
});

describe('sameAddress', () => {
    it('compares IPv4 addresses', () => {
        expect(sameAddress('10.0.0.5', '10.0.0.5')).toBe(true);
        expect(sameAddress('10.0.0.5', '10.0.0.6')).toBe(false);
    });

    it('compares IPv6 addresses in any notation', () => {
        expect(sameAddress('2001:db8::1', '2001:0db8:0:0:0:0:0:1')).toBe(true);
        expect(sameAddress('::', '0:0:0:0:0:0:0:0')).toBe(true);
        expect(sameAddress('2001:db8::1', '2001:db8::2')).toBe(false);
    });

    it('matches IPv4-mapped addresses with plain IPv4', () => {
        expect(sameAddress('::ffff:10.0.0.5', '10.0.0.5')).toBe(true);
        expect(sameAddress('::ffff:a00:5', '10.0.0.5')).toBe(true);
    });

    it('never matches a hostname', () => {
        expect(sameAddress('vpn.example.test', 'vpn.example.test')).toBe(false);
        expect(sameAddress('', '10.0.0.5')).toBe(false);
    });
});

describe('AddressResolver', () => {
    it('resolves through the lookup function', async () => {
        const resolver = new AddressResolver(async () => ['2001:db8::10', '203.0.113.9']);

        expect(await resolver.resolve('vpn.example.test')).toBe('203.0.113.9');
        expect(await resolver.resolve('vpn.example.test', true)).toBe('2001:db8::10');
    });

    it('fails when no address of the family exists', async () => {
        const resolver = new AddressResolver(async () => ['203.0.113.9']);

        await expect(resolver.resolve('vpn.example.test', true)).rejects.toThrow(
            new OvpnUpdateError('vpn.example.test has no IPv6 address')
        );
    });

    it('wraps lookup failures', async () => {
        const resolver = new AddressResolver(async () => {
            throw new Error('getaddrinfo ENOTFOUND vpn.example.test');
        });

        await expect(resolver.resolve('vpn.example.test')).rejects.toThrow(
            'Could not resolve vpn.example.test: getaddrinfo ENOTFOUND vpn.example.test'
        );
    });
});
