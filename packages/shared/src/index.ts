// Schemas
export {
    SourceHintSchema,
    ExtractionInputSchema,
    LineItemSchema,
    ExtractedFieldsSchema,
    CategoryRuleSchema,
    RuleFileSchema,
    PatternTableSchema,
    CategorySchema,
    NewCategorySchema,
    CategoryRefSchema,
    DefaultCategorySchema,
    DefaultCategoryFileSchema,
    DocumentRecordSchema,
    TransactionRecordSchema,
    TransactionParseResultSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
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
} from './constants.js';
