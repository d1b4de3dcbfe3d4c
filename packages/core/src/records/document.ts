/**
 * Mapping from extracted fields to a stored document record.
 */

import type { DocumentRecord, ExtractedFields, ExtractionInput } from '../types/index.js';
import { generateDocumentId } from '../utils/record-id.js';

export interface DocumentMeta {
    sourceFile: string;
    ingestedAt: Date;
}

/**
 * Build a new, uncategorized document record.
 *
 * Fields are copied one by one so a field added to ExtractedFields has to be
 * mapped here deliberately. Absent fields stay absent.
 */
export function buildDocumentRecord(
    input: ExtractionInput,
    fields: ExtractedFields,
    meta: DocumentMeta
): DocumentRecord {
    const record: DocumentRecord = {
        doc_id: generateDocumentId(input.source, input.sender, input.text),
        source: input.source,
        source_file: meta.sourceFile,
        ingested_at: meta.ingestedAt.toISOString(),
        raw_text: input.text,
        line_items: fields.line_items.map((item) => ({
            description: item.description,
            total_price: item.total_price,
        })),
        category_id: null,
        auto_categorized: false,
        categorized_at: null,
        is_duplicate: false,
        duplicate_of: null,
    };

    if (fields.merchant_name !== undefined) record.merchant_name = fields.merchant_name;
    if (fields.amount !== undefined) record.amount = fields.amount;
    if (fields.tax_amount !== undefined) record.tax_amount = fields.tax_amount;
    if (fields.tip_amount !== undefined) record.tip_amount = fields.tip_amount;
    if (fields.subtotal !== undefined) record.subtotal = fields.subtotal;
    if (fields.transaction_date !== undefined) record.transaction_date = fields.transaction_date;
    if (fields.card_last_four !== undefined) record.card_last_four = fields.card_last_four;
    if (fields.raw_body !== undefined) record.raw_body = fields.raw_body;

    const sender = fields.sender ?? input.sender;
    if (sender !== undefined) record.sender = sender;

    return record;
}
