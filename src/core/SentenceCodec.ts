/**
 * SentenceCodec.ts
 * Converts between sentences and the words that carry them.
 *
 * A sentence is a command word (`/interface/print`, or a reply marker such as
 * `!re`, `!done`, `!trap`) followed by attribute words and closed by an empty word.
 * Attribute names keep their protocol sigil (`=name`, `.tag`, `?query`).
 */

/** Reply markers sent by the router as the command word of a sentence. */
export const ReplyMarker = {
    /** Data row */
    RE: '!re',
    /** End of a reply */
    DONE: '!done',
    /** Command-level failure; `!done` still follows */
    TRAP: '!trap',
    /** The router is about to drop the connection */
    FATAL: '!fatal'
} as const;

/** Attribute name (sigil included) to value. */
export type SentenceAttributes = Record<string, string>;

export interface Sentence {
    command: string;
    attributes: SentenceAttributes;
}

/**
 * Anything that can move single words in both directions.
 * Implemented by SocketClient.
 */
export interface WordTransport {
    writeWord(word: string): void;
    readWord(): Promise<string>;
}

export class SentenceCodec {

    /** The "no data" sentence produced by a lone terminator word. */
    public static empty(): Sentence {
        return { command: '', attributes: {} };
    }

    public static isEmpty(sentence: Sentence): boolean {
        return sentence.command.length === 0 && Object.keys(sentence.attributes).length === 0;
    }

    /**
     * Flattens a sentence into its words, without the terminator.
     * Attribute order carries no meaning.
     */
    public static toWords(sentence: Sentence): string[] {
        const words = [sentence.command];
        for (const [name, value] of Object.entries(sentence.attributes)) {
            words.push(`${name}=${value}`);
        }
        return words;
    }

    /**
     * Splits `=name=value` at the first `=` after the leading sigil,
     * so values may contain `=` themselves.
     * A word without a separator is a bare name with an empty value.
     */
    public static splitAttribute(word: string): [string, string] {
        const separator = word.indexOf('=', 1);
        if (separator === -1) return [word, ''];
        return [word.substring(0, separator), word.substring(separator + 1)];
    }

    /**
     * Builds a sentence from the words received before a terminator.
     * Zero words yield the empty sentence.
     */
    public static fromWords(words: string[]): Sentence {
        if (words.length === 0) return SentenceCodec.empty();

        const attributes: SentenceAttributes = {};
        for (const word of words.slice(1)) {
            const [name, value] = SentenceCodec.splitAttribute(word);
            attributes[name] = value;
        }

        return { command: words[0], attributes };
    }

    /** Writes the sentence words followed by the empty terminator word. */
    public static write(transport: WordTransport, sentence: Sentence): void {
        for (const word of SentenceCodec.toWords(sentence)) {
            transport.writeWord(word);
        }
        transport.writeWord('');
    }

    /** Reads words up to the next terminator. */
    public static async read(transport: WordTransport): Promise<Sentence> {
        const words: string[] = [];
        for (;;) {
            const word = await transport.readWord();
            if (word.length === 0) break;
            words.push(word);
        }
        return SentenceCodec.fromWords(words);
    }
}
