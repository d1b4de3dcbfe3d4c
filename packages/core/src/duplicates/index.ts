export { findDuplicates, DOCUMENT_DUPLICATE_ACCESSORS, TRANSACTION_DUPLICATE_ACCESSORS } from './find-duplicates.js';
export type { DuplicateAccessors, DuplicateMark } from './find-duplicates.js';
export { daysBetween, isWithinDateTolerance } from './date-diff.js';
