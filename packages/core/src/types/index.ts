/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    SourceHint,
    ExtractionInput,
    LineItem,
    ExtractedFields,
    CategoryRule,
    PatternTable,
    Category,
    NewCategory,
    CategoryRef,
    DefaultCategory,
    DocumentRecord,
    TransactionRecord,
    TransactionParseResult,
    RunManifest,
} from '@tallyslip/shared';

export {
    ExtractedFieldsSchema,
    CategoryRuleSchema,
    CategorySchema,
    NewCategorySchema,
    DocumentRecordSchema,
    TransactionRecordSchema,
    DEFAULT_PATTERN_TABLE,
    DESCRIPTION_FALLBACKS,
    SMS_RECEIPT_KEYWORDS,
    EMAIL_RECEIPT_KEYWORDS,
    KNOWN_EMAIL_SENDERS,
    RECEIPT_EXTRACTION,
    SMS_MERCHANT_MIN_LENGTH,
    KEYWORD_VALIDATION,
    DUPLICATE_WINDOW_DAYS,
    RECORD_ID,
} from '@tallyslip/shared';
