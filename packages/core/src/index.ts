// Types (re-exported from shared)
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
} from './types/index.js';

export { DEFAULT_PATTERN_TABLE, DESCRIPTION_FALLBACKS } from './types/index.js';

// Errors
export { CategoryConflictError, StorageError } from './errors.js';

// Utils
export { generateDocumentId, generateTxnId, resolveCollisions } from './utils/record-id.js';
export { normalizeDescription, normalizeForMatch, titleCase } from './utils/normalize.js';
export { parseMoney, formatMoney } from './utils/money.js';
export { formatIsoDate, parseIsoDate, parseRfc2822Date } from './utils/date-parse.js';

// Extraction
export {
    extractDocument,
    extractReceiptFields,
    extractSmsFields,
    extractEmailFields,
    merchantFromSender,
    parseMessageEnvelope,
} from './extractor/index.js';
export type { MessageExtractOptions, EmailMessage, MessageEnvelope } from './extractor/index.js';

// Categorization
export {
    categorize,
    Categorizer,
    materializeCategory,
    initializeDefaultCategories,
    categorizeAll,
    isUncategorized,
    validateKeyword,
    checkKeywordCollision,
} from './categorizer/index.js';
export type {
    CategorizerOptions,
    MaterializeOptions,
    InitializeResult,
    CategorizableRecord,
    CategorySource,
    CategorizeKind,
    CategoryMatch,
    CategorizeOptions,
    CategoryRepository,
    ResolvedCategory,
    CategorizationStats,
    KeywordValidationResult,
    KeywordCollision,
    CollisionResult,
} from './categorizer/index.js';
export { InMemoryCategoryRepository } from './repository/memory.js';

// Records & duplicates
export { buildDocumentRecord } from './records/index.js';
export type { DocumentMeta } from './records/index.js';
export {
    findDuplicates,
    DOCUMENT_DUPLICATE_ACCESSORS,
    TRANSACTION_DUPLICATE_ACCESSORS,
    daysBetween,
} from './duplicates/index.js';
export type { DuplicateAccessors, DuplicateMark } from './duplicates/index.js';

// Bank exports
export { parseTransactionsFile, detectSource, getSupportedPatterns } from './parser/index.js';
export type { ImportKind } from './parser/index.js';
