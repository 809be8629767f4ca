import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { RosAuthError } from './RosError';

/**
 * Auth.ts
 * Challenge-response helpers for the RouterOS `/login` handshake.
 */
export class Auth {

    /**
     * Calculates the MD5 response for the challenge login.
     * Logic: response = "00" + MD5( 0x00 + Password + Seed_Bytes )
     *
     * The buffer holding the password is zeroed once the digest is taken.
     *
     * @param password The user's password.
     * @param seedHex The `=ret` value of the first `/login` reply.
     * @returns The `=response` value expected by the router.
     */
    public static calculateLegacyMD5(password: string, seedHex: string): string {
        // RouterOS seeds are 32 hex characters (16 bytes)
        if (seedHex.length === 0 || seedHex.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(seedHex)) {
            throw new RosAuthError(`Invalid login seed received from router: "${seedHex}"`);
        }

        const seedBytes = Buffer.from(seedHex, 'hex');
        const passwordBytes = Buffer.from(password, 'utf8');

        // Byte 0 stays zero, then password, then seed
        const bufferToHash = Buffer.alloc(1 + passwordBytes.length + seedBytes.length);
        passwordBytes.copy(bufferToHash, 1);
        seedBytes.copy(bufferToHash, 1 + passwordBytes.length);

        try {
            return '00' + crypto.createHash('md5').update(bufferToHash).digest('hex');
        } finally {
            bufferToHash.fill(0);
            passwordBytes.fill(0);
        }
    }

    /**
     * Sanitizes sensitive strings for safe logging.
     *
     * @example
     * Auth.mask('supersecret') // returns "s********t"
     * Auth.mask('123') // returns "***"
     */
    public static mask(value: string | undefined): string {
        if (!value) return '<empty>';
        if (value.length < 4) return '***';

        const visibleStart = value.substring(0, 1);
        const visibleEnd = value.substring(value.length - 1);
        const maskLength = Math.min(value.length - 2, 8); // Cap mask length for readability

        return `${visibleStart}${'*'.repeat(maskLength)}${visibleEnd}`;
    }

    /**
     * Masks the value of a `=password=...` word, leaves other words alone.
     */
    public static maskWord(word: string): string {
        const prefix = '=password=';
        if (!word.startsWith(prefix)) return word;
        return prefix + Auth.mask(word.substring(prefix.length));
    }
}
