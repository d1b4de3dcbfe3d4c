export { buildDocumentRecord } from './document.js';
export type { DocumentMeta } from './document.js';
