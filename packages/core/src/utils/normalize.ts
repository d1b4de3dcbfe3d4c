/**
 * Text normalization for keyword matching and display names.
 */

/**
 * Normalize text for keyword matching: lowercase, collapsed whitespace.
 * Keywords are substrings, so punctuation is left alone ("joe's" must still match).
 */
export function normalizeForMatch(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Normalize a bank description for display and duplicate keys.
 *
 * Transformations:
 * - Replace * and # with space (common bank separators)
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 */
export function normalizeDescription(raw: string): string {
    return raw
        .replace(/[*#]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Title-case a label: first letter of every word upper, the rest lower.
 * Words are split on whitespace, hyphens and underscores.
 *
 * @example titleCase('gas') === 'Gas'
 * @example titleCase('blue-bottle') === 'Blue-Bottle'
 */
export function titleCase(value: string): string {
    return value
        .toLowerCase()
        .replace(/(^|[\s\-_])([a-z])/g, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}
