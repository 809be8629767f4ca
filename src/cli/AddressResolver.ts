import { lookup } from 'dns/promises';
import { isIP } from 'net';
import { Logger, silentLogger } from '../utils/Logger';
import { OvpnUpdateError } from './OvpnUpdateError';

/** Resolves a hostname to every address it has, in resolver order. */
export type LookupFn = (hostname: string) => Promise<string[]>;

export const systemLookup: LookupFn = async (hostname) => {
    const results = await lookup(hostname, { all: true, verbatim: true });
    return results.map(result => result.address);
};

/**
 * Picks the first address of the preferred family.
 */
export function pickAddress(addresses: string[], preferIpv6: boolean): string | null {
    const family = preferIpv6 ? 6 : 4;
    return addresses.find(address => isIP(address) === family) ?? null;
}

/**
 * Expands an address into its 16 bytes, IPv4 as IPv4-mapped IPv6.
 * Returns null for anything that is not an IP literal.
 */
function toBytes(address: string): number[] | null {
    const family = isIP(address);

    if (family === 4) {
        return [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff, ...address.split('.').map(Number)];
    }
    if (family !== 6) return null;

    let text = address.split('%')[0];

    // Trailing dotted quad, e.g. ::ffff:10.0.0.5
    const lastColon = text.lastIndexOf(':');
    if (text.indexOf('.', lastColon) !== -1) {
        const [a, b, c, d] = text.substring(lastColon + 1).split('.').map(Number);
        text = `${text.substring(0, lastColon + 1)}${((a << 8) | b).toString(16)}:${((c << 8) | d).toString(16)}`;
    }

    let groups: string[];
    const gap = text.indexOf('::');
    if (gap === -1) {
        groups = text.split(':');
    } else {
        const head = text.substring(0, gap).split(':').filter(Boolean);
        const tail = text.substring(gap + 2).split(':').filter(Boolean);
        groups = [...head, ...new Array<string>(8 - head.length - tail.length).fill('0'), ...tail];
    }

    return groups.flatMap(group => {
        const value = parseInt(group, 16);
        return [value >> 8, value & 0xff];
    });
}

/**
 * Compares two addresses as IPs, so `2001:db8::1` equals `2001:0db8:0:0:0:0:0:1`
 * and `::ffff:10.0.0.5` equals `10.0.0.5`. Non-IP strings never match.
 */
export function sameAddress(left: string, right: string): boolean {
    const a = toBytes(left);
    const b = toBytes(right);
    if (!a || !b) return false;
    return a.every((byte, index) => byte === b[index]);
}

export class AddressResolver {
    constructor(
        private readonly lookupFn: LookupFn = systemLookup,
        private readonly logger: Logger = silentLogger
    ) {}

    /**
     * Resolves `hostname` and returns its first address of the preferred family.
     * @throws OvpnUpdateError when the lookup fails or no such address exists.
     */
    public async resolve(hostname: string, preferIpv6: boolean = false): Promise<string> {
        this.logger.info(`Looking up ${hostname}`);

        let addresses: string[];
        try {
            addresses = await this.lookupFn(hostname);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new OvpnUpdateError(`Could not resolve ${hostname}: ${reason}`);
        }

        for (const address of addresses) {
            this.logger.debug(`Got IP: ${address}`);
        }

        const address = pickAddress(addresses, preferIpv6);
        if (!address) {
            throw new OvpnUpdateError(`${hostname} has no IPv${preferIpv6 ? 6 : 4} address`);
        }
        return address;
    }
}
