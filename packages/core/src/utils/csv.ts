/**
 * Spreadsheet row helpers shared by the bank export parser.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}

/**
 * Re-key a parsed row with BOM-free, trimmed, case-folded headers.
 * "\uFEFFDate " and "date" both become "date".
 */
export function normalizeRowKeys(row: Record<string, unknown>): Record<string, unknown> {
    const clean: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
        clean[stripBom(key).trim().toLowerCase()] = value;
    }
    return clean;
}

/**
 * Read a cell as trimmed text; empty cells come back as ''.
 */
export function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}
