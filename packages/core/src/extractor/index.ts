/**
 * Extractor module: raw document text to candidate fields.
 */

import type { ExtractionInput, ExtractedFields } from '../types/index.js';
import { extractReceiptFields } from './receipt.js';
import { extractSmsFields } from './sms.js';
import type { MessageExtractOptions } from './sms.js';
import { extractEmailFields } from './email.js';

/**
 * Dispatch on the source hint.
 *
 * @returns null when an SMS or e-mail is not a receipt; receipts always yield fields
 */
export function extractDocument(
    input: ExtractionInput,
    options: MessageExtractOptions = {}
): ExtractedFields | null {
    switch (input.source) {
        case 'receipt_ocr':
            return extractReceiptFields(input.text);
        case 'sms':
            return extractSmsFields(input.text, input.sender ?? '', options);
        case 'email':
            return extractEmailFields(
                {
                    subject: input.subject,
                    body: input.text,
                    sender: input.sender,
                    date: input.received_at,
                },
                options
            );
    }
}

export { extractReceiptFields } from './receipt.js';
export { extractSmsFields } from './sms.js';
export type { MessageExtractOptions } from './sms.js';
export { extractEmailFields, merchantFromSender } from './email.js';
export type { EmailMessage } from './email.js';
export { parseMessageEnvelope } from './envelope.js';
export type { MessageEnvelope } from './envelope.js';
