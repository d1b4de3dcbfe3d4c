/**
 * Zod schemas for Tallyslip data structures.
 *
 * IMPORTANT: Money values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { RECORD_ID } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * ISO-8601 timestamp (e.g. 2024-01-15T00:00:00.000Z).
 */
const isoTimestamp = z.string().datetime({ offset: true });

/**
 * Extracted money value: non-negative, exactly two fraction digits.
 */
const moneyString = z.string().regex(/^\d+\.\d{2}$/, 'Must be a non-negative amount with cent precision');

/**
 * Signed decimal amount (bank transactions).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Document ID: 16-char hex.
 */
const docId = z.string().regex(
    new RegExp(`^[0-9a-f]{${RECORD_ID.LENGTH}}$`),
    `Must be ${RECORD_ID.LENGTH}-char hex`
);

/**
 * Transaction ID: 16-char hex, optionally with collision suffix (e.g. "-02").
 */
const txnId = z.string().regex(
    new RegExp(`^[0-9a-f]{${RECORD_ID.LENGTH}}(-\\d{2})?$`),
    `Must be ${RECORD_ID.LENGTH}-char hex, optionally with -NN suffix`
);

// ============================================================================
// Extraction Schemas
// ============================================================================

export const SourceHintSchema = z.enum(['receipt_ocr', 'sms', 'email']);

export type SourceHint = z.infer<typeof SourceHintSchema>;

/**
 * Raw document handed to the extractor.
 * `subject` and `received_at` are only read for e-mail.
 */
export const ExtractionInputSchema = z.object({
    text: z.string(),
    source: SourceHintSchema,
    sender: z.string().optional(),
    subject: z.string().optional(),
    received_at: z.string().optional(),
});

export type ExtractionInput = z.infer<typeof ExtractionInputSchema>;

export const LineItemSchema = z.object({
    description: z.string().min(1),
    total_price: moneyString,
});

export type LineItem = z.infer<typeof LineItemSchema>;

/**
 * Structured candidate fields produced by the extractors.
 * A field that failed to parse is absent, never zero-filled.
 */
export const ExtractedFieldsSchema = z.object({
    merchant_name: z.string().min(1).optional(),
    amount: moneyString.optional(),
    tax_amount: moneyString.optional(),
    tip_amount: moneyString.optional(),
    subtotal: moneyString.optional(),
    transaction_date: isoTimestamp.optional(),
    line_items: z.array(LineItemSchema),
    card_last_four: z.string().regex(/^\d{4}$/).optional(),
    raw_body: z.string().optional(),
    sender: z.string().optional(),
});

export type ExtractedFields = z.infer<typeof ExtractedFieldsSchema>;

// ============================================================================
// Categorization Schemas
// ============================================================================

/**
 * Keyword rule. Keywords are matched as lowercase substrings.
 * Rules are deactivated, never deleted.
 */
export const CategoryRuleSchema = z.object({
    category: z.string().min(1),
    keywords: z.array(z.string().min(1).transform((k) => k.toLowerCase())),
    is_system: z.boolean().default(false),
    active: z.boolean().default(true),
    note: z.string().optional(),
    added_date: isoDateString.optional(),
});

export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

/**
 * Rules file contents: either a bare list or `{ rules: [...] }`.
 */
export const RuleFileSchema = z.union([
    z.array(CategoryRuleSchema),
    z.object({ rules: z.array(CategoryRuleSchema).nullable().default([]) }),
]);

/**
 * Ordered (category, keywords) pairs used as a fallback table.
 */
export const PatternTableSchema = z.array(
    z.object({
        category: z.string().min(1),
        keywords: z.array(z.string().min(1)).readonly(),
    })
).readonly();

export type PatternTable = z.infer<typeof PatternTableSchema>;

export const CategorySchema = z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
    description: z.string().optional(),
    color: z.string().regex(/^#[0-9A-Fa-f]{6}$/).optional(),
    icon: z.string().optional(),
    is_system: z.boolean(),
    is_active: z.boolean().default(true),
    is_income: z.boolean().default(false),
});

export type Category = z.infer<typeof CategorySchema>;

/**
 * Fields supplied when creating a category; storage assigns the id.
 */
export const NewCategorySchema = CategorySchema.omit({ id: true });

export type NewCategory = z.input<typeof NewCategorySchema>;

export const CategoryRefSchema = z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
});

export type CategoryRef = z.infer<typeof CategoryRefSchema>;

/**
 * Built-in category shipped with the workspace template.
 */
export const DefaultCategorySchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    color: z.string().regex(/^#[0-9A-Fa-f]{6}$/).optional(),
    icon: z.string().optional(),
    is_income: z.boolean().default(false),
    keywords: z.array(z.string().min(1)).default([]),
});

export type DefaultCategory = z.infer<typeof DefaultCategorySchema>;

export const DefaultCategoryFileSchema = z.object({
    categories: z.array(DefaultCategorySchema),
});

// ============================================================================
// Stored Record Schemas
// ============================================================================

/**
 * Bookkeeping shared by every stored record.
 * `categorized_at` is null until the categorizer has been run on the record.
 */
const categorizationFields = {
    category_id: z.number().int().positive().nullable(),
    auto_categorized: z.boolean(),
    categorized_at: isoTimestamp.nullable(),
    is_duplicate: z.boolean(),
    duplicate_of: z.string().nullable(),
};

/**
 * Ingested receipt, SMS or e-mail.
 */
export const DocumentRecordSchema = ExtractedFieldsSchema.extend({
    doc_id: docId,
    source: SourceHintSchema,
    source_file: z.string(),
    ingested_at: isoTimestamp,
    raw_text: z.string(),
    ...categorizationFields,
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;

/**
 * Bank transaction imported from an export file.
 */
export const TransactionRecordSchema = z.object({
    txn_id: txnId,
    txn_date: isoDateString,
    description: z.string(),
    merchant_name: z.string().min(1).optional(),
    amount: decimalString,
    source_file: z.string(),
    ...categorizationFields,
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Result returned by bank export parsers.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const TransactionParseResultSchema = z.object({
    transactions: z.array(TransactionRecordSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type TransactionParseResult = z.infer<typeof TransactionParseResultSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Run manifest for tracking ingested files.
 */
export const RunManifestSchema = z.object({
    run_date: isoDateString,
    run_timestamp: z.string(),
    input_files: z.record(z.string(), z.string()),
    document_count: z.number().int().min(0),
    transaction_count: z.number().int().min(0),
    doc_ids: z.array(z.string()),
    txn_ids: z.array(z.string()),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
