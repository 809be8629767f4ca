import { kebabToCamel, isNumeric, parseBoolean } from '../utils/Helpers';
import { ReplyMarker, Sentence, SentenceAttributes } from '../core/SentenceCodec';

export type RecordValue = string | number | boolean;
export type ParsedRecord = Record<string, RecordValue>;

/**
 * ResultParser.ts
 * Turns raw reply sentences into plain JavaScript objects.
 * Features:
 * - Drops the `=` sigil and the dot from ".id" (`=.id` -> `id`).
 * - Converts property keys from kebab-case to camelCase.
 * - Auto-converts string numbers to JS numbers.
 * - Auto-converts "true"/"false"/"yes"/"no" to JS booleans.
 */
export class ResultParser {

    /**
     * Parses the data rows (`!re` sentences) of a reply.
     */
    public static records(reply: Sentence[]): ParsedRecord[] {
        return reply
            .filter(sentence => sentence.command === ReplyMarker.RE)
            .map(sentence => ResultParser.parseItem(sentence.attributes));
    }

    /**
     * Parses a single attribute map.
     * Only `=` attributes are data; `.tag` and other sigils are skipped.
     */
    public static parseItem(attributes: SentenceAttributes): ParsedRecord {
        const cleanItem: ParsedRecord = {};

        for (const [name, value] of Object.entries(attributes)) {
            if (!name.startsWith('=')) continue;

            let newKey = name.substring(1);
            if (newKey.startsWith('.')) newKey = newKey.substring(1);
            newKey = kebabToCamel(newKey);

            cleanItem[newKey] = ResultParser.inferType(value);
        }

        return cleanItem;
    }

    /**
     * Infers the JavaScript type from the string value.
     */
    private static inferType(value: string): RecordValue {
        const boolVal = parseBoolean(value);
        if (boolVal !== null) return boolVal;

        // "1.1.1.1", "6.48.6" and "1e3" stay strings
        if (isNumeric(value)) {
            return parseFloat(value);
        }

        return value;
    }
}
