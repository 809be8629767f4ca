/**
 * Helpers.ts
 * Utility functions for string manipulation and type checking.
 */

/**
 * Converts a kebab-case string (e.g., "connect-to") to camelCase (e.g., "connectTo").
 */
export function kebabToCamel(str: string): string {
    return str.replace(/-./g, (x) => x[1].toUpperCase());
}

/**
 * Checks if a string is a plain decimal number: optional minus, digits,
 * at most one fractional part. Exponents and padding do not count.
 */
export function isNumeric(str: string): boolean {
    return /^-?\d+(\.\d+)?$/.test(str);
}

/**
 * Standardizes boolean values from MikroTik (yes/no/true/false) to JS booleans.
 */
export function parseBoolean(value: string): boolean | null {
    if (value === 'true' || value === 'yes') return true;
    if (value === 'false' || value === 'no') return false;
    return null; // Not a boolean
}

/**
 * Prefixes plain attribute names with the `=` sigil.
 * Names starting with `=` or `?`, and the `.tag` API attribute, are kept as they are.
 *
 * @example
 * toAttributes({ '.id': '*1', 'connect-to': '10.0.0.5' })
 * // { '=.id': '*1', '=connect-to': '10.0.0.5' }
 */
export function toAttributes(params: Record<string, string | number | boolean>): Record<string, string> {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(params)) {
        const name = /^[=?]/.test(key) || key === '.tag' ? key : `=${key}`;
        attributes[name] = String(value);
    }
    return attributes;
}
