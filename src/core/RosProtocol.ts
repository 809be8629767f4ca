/**
 * RosProtocol.ts
 * Length encoding for the RouterOS API wire format.
 *
 * Every word on the wire is preceded by a 1-5 byte length prefix. The number of
 * leading one bits in the first byte tells how many bytes the prefix spans:
 *
 *   0xxxxxxx                                    < 0x80
 *   10xxxxxx xxxxxxxx                           < 0x4000
 *   110xxxxx xxxxxxxx xxxxxxxx                  < 0x200000
 *   1110xxxx xxxxxxxx xxxxxxxx xxxxxxxx         < 0x10000000
 *   11110000 xxxxxxxx xxxxxxxx xxxxxxxx xxxxxxxx
 *
 * The prefix must match the router's encoder bit for bit: a wrong length leaves
 * the stream unreadable for the rest of the session.
 */
import { Buffer } from 'buffer';
import { RosFramingError } from './RosError';

export interface DecodedLength {
    /** Payload length in bytes */
    length: number;
    /** Bytes taken by the prefix itself */
    byteLength: number;
}

/** Largest value the 5-byte form can carry. */
export const MAX_WORD_LENGTH = 0xffffffff;

export class RosProtocol {

    /**
     * Encodes a word length into its narrowest prefix.
     * Values are packed with unsigned writes so the marker bits never sign-extend.
     */
    public static encodeLength(length: number): Buffer {
        if (!Number.isInteger(length) || length < 0 || length > MAX_WORD_LENGTH) {
            throw new RangeError(`Word length out of range: ${length}`);
        }

        let header: Buffer;

        if (length < 0x80) {
            header = Buffer.alloc(1);
            header.writeUInt8(length, 0);
        } else if (length < 0x4000) {
            header = Buffer.alloc(2);
            header.writeUInt16BE((length | 0x8000) >>> 0, 0);
        } else if (length < 0x200000) {
            header = Buffer.alloc(3);
            header.writeUIntBE((length | 0xc00000) >>> 0, 0, 3);
        } else if (length < 0x10000000) {
            header = Buffer.alloc(4);
            header.writeUInt32BE((length | 0xe0000000) >>> 0, 0);
        } else {
            header = Buffer.alloc(5);
            header.writeUInt8(0xf0, 0);
            header.writeUInt32BE(length, 1);
        }

        return header;
    }

    /**
     * Encodes a word (a command, a reply marker or an `=name=value` pair)
     * as prefix + UTF-8 bytes. The prefix counts bytes, not characters.
     *
     * @param word e.g. "/ip/address/print" or "=disabled=yes"
     */
    public static encodeWord(word: string): Buffer {
        const encoded = Buffer.from(word, 'utf8');
        return Buffer.concat([RosProtocol.encodeLength(encoded.length), encoded]);
    }

    /**
     * Reads the length prefix at the start of `buffer`.
     *
     * @returns the decoded length and the prefix size, or null if the buffer
     * does not hold the whole prefix yet.
     * @throws RosFramingError when the first byte is a reserved control byte (0xF8-0xFF).
     */
    public static decodeLength(buffer: Buffer): DecodedLength | null {
        if (buffer.length === 0) return null;

        const b = buffer.readUInt8(0);

        // 0xxxxxxx
        if ((b & 0x80) === 0x00) {
            return { length: b, byteLength: 1 };
        }

        // 10xxxxxx
        if ((b & 0xc0) === 0x80) {
            if (buffer.length < 2) return null;
            return { length: buffer.readUInt16BE(0) & 0x3fff, byteLength: 2 };
        }

        // 110xxxxx
        if ((b & 0xe0) === 0xc0) {
            if (buffer.length < 3) return null;
            return { length: buffer.readUIntBE(0, 3) & 0x1fffff, byteLength: 3 };
        }

        // 1110xxxx
        if ((b & 0xf0) === 0xe0) {
            if (buffer.length < 4) return null;
            return { length: (buffer.readUInt32BE(0) & 0x0fffffff) >>> 0, byteLength: 4 };
        }

        // 11110xxx: the low bits of the marker are unused, the length follows in 4 plain bytes
        if ((b & 0xf8) === 0xf0) {
            if (buffer.length < 5) return null;
            return { length: buffer.readUInt32BE(1), byteLength: 5 };
        }

        throw new RosFramingError(`Invalid length prefix byte 0x${b.toString(16).padStart(2, '0')}`);
    }
}
