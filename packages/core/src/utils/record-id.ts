/**
 * Record ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import { Decimal } from 'decimal.js';
import { RECORD_ID } from '../types/index.js';
import type { SourceHint } from '../types/index.js';

/**
 * Generate a deterministic document ID.
 *
 * Payload format: "{source}|{sender}|{text}". Re-ingesting the same message
 * from the same sender yields the same ID.
 *
 * @returns 16-character hex document ID
 */
export function generateDocumentId(source: SourceHint, sender: string | undefined, text: string): string {
    const payload = `${source}|${sender ?? ''}|${text}`;
    return sha256(payload).slice(0, RECORD_ID.LENGTH);
}

/**
 * Generate deterministic transaction ID via SHA-256 hash.
 *
 * Payload format: "{txn_date}|{raw_description}|{signed_amount}"
 *   - txn_date: ISO 8601 YYYY-MM-DD
 *   - raw_description: raw text (NO normalization before hash)
 *   - signed_amount: plain decimal string, no trailing zeros
 *
 * @returns 16-character hex transaction ID
 */
export function generateTxnId(txnDate: string, rawDescription: string, signedAmount: Decimal): string {
    // Decimal.toFixed() without args removes trailing zeros
    const amountStr = signedAmount.toFixed();

    const payload = `${txnDate}|${rawDescription}|${amountStr}`;
    return sha256(payload).slice(0, RECORD_ID.LENGTH);
}

/**
 * Resolve collisions by adding deterministic suffixes.
 *
 * Same-day identical transactions get -02, -03, etc. Files must be processed
 * in lexicographic order for the suffixes to be stable across runs.
 *
 * PURE FUNCTION: Returns new array with updated IDs. Does not mutate input.
 */
export function resolveCollisions<T extends { txn_id: string }>(transactions: readonly T[]): T[] {
    const seen: Record<string, number> = {};
    const result: T[] = [];

    for (const txn of transactions) {
        const baseId = txn.txn_id;
        const count = seen[baseId];

        if (count !== undefined) {
            const next = count + 1;
            seen[baseId] = next;

            // Cap at 99 collisions to match schema regex (-\d{2})
            if (next > 99) {
                throw new Error(`Collision overflow: ${baseId} has reached max limit of 99 duplicates`);
            }

            const suffix = String(next).padStart(2, '0');
            result.push({ ...txn, txn_id: `${baseId}-${suffix}` });
        } else {
            seen[baseId] = RECORD_ID.COLLISION_SUFFIX_START - 1;
            result.push({ ...txn });
        }
    }

    return result;
}
