export { parseTransactionsFile } from './transactions.js';
export { detectSource, getSupportedPatterns } from './detect.js';
export type { ImportKind } from './detect.js';
