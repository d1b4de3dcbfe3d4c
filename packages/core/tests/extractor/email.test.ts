import { describe, it, expect } from 'vitest';
import { extractEmailFields, merchantFromSender } from '../../src/extractor/email.js';
import { ExtractedFieldsSchema } from '../../src/types/index.js';

const now = new Date('2024-06-01T09:30:00.000Z');

describe('extractEmailFields', () => {
    it('returns null without a receipt keyword', () => {
        expect(extractEmailFields({ subject: 'Hello', body: 'See you soon', sender: 'friend@example.com' })).toBeNull();
    });

    it('extracts a known sender, the last amount and the Date header', () => {
        const fields = extractEmailFields({
            subject: 'Your Amazon.com order',
            body: 'Subtotal $20.00\nOrder total: $23.99\nThanks',
            sender: 'auto-confirm@amazon.com',
            date: 'Mon, 15 Jan 2024 10:30:00 +0000',
        });
        expect(fields).toEqual({
            line_items: [],
            merchant_name: 'Amazon',
            amount: '23.99',
            transaction_date: '2024-01-15T10:30:00.000Z',
            sender: 'auto-confirm@amazon.com',
        });
    });

    it('uses the processing time for an unparseable Date header', () => {
        const fields = extractEmailFields({ body: 'Invoice total 5.00', sender: 'billing@acme.io', date: 'whenever' }, { now });
        expect(fields?.transaction_date).toBe('2024-06-01T09:30:00.000Z');
        expect(fields?.amount).toBe('5.00');
    });

    it('uses the processing time for numbers that are not a Date header', () => {
        for (const date of ['1', '12345']) {
            const fields = extractEmailFields({ body: 'your receipt total $5.00', date }, { now });
            expect(fields?.transaction_date).toBe('2024-06-01T09:30:00.000Z');
            expect(ExtractedFieldsSchema.safeParse(fields).success).toBe(true);
        }
    });

    it('omits the date when there is no Date header', () => {
        expect(extractEmailFields({ body: 'Your receipt', sender: 'shop@acme.io' })?.transaction_date).toBeUndefined();
    });

    it('reads card suffixes', () => {
        const fields = extractEmailFields({ body: 'Payment of $5.00 with card ending in 1111', sender: 'x@acme.io' });
        expect(fields?.card_last_four).toBe('1111');
    });
});

describe('merchantFromSender', () => {
    it('matches known senders by substring', () => {
        expect(merchantFromSender('noreply@uber.com')).toBe('Uber');
        expect(merchantFromSender('service@PayPal.com')).toBe('PayPal');
    });

    it('title-cases the first domain label otherwise', () => {
        expect(merchantFromSender('receipts@bluebottle.com')).toBe('Bluebottle');
        expect(merchantFromSender('Cafe Luna <hello@cafe-luna.com>')).toBe('Cafe-Luna');
    });

    it('returns undefined without an address', () => {
        expect(merchantFromSender('')).toBeUndefined();
    });
});
