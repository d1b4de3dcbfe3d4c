import { parseMessageEnvelope } from '@tallyslip/core';
import type { ExtractionInput, SourceHint } from '@tallyslip/core';

/**
 * Turn the raw contents of an import file into extractor input.
 *
 * Receipts are plain OCR text. SMS and e-mail files may carry a header block
 * (From / Subject / Date) before the body.
 */
export function toExtractionInput(source: SourceHint, raw: string): ExtractionInput {
    if (source === 'receipt_ocr') {
        return { text: raw, source };
    }

    const { headers, body } = parseMessageEnvelope(raw);
    const input: ExtractionInput = { text: body, source };

    const sender = headers['from'] ?? headers['sender'];
    if (sender) input.sender = sender;

    if (source === 'email') {
        if (headers['subject']) input.subject = headers['subject'];
        if (headers['date']) input.received_at = headers['date'];
    }
    return input;
}
