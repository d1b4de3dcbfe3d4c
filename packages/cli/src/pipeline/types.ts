import type { DocumentRecord, TransactionRecord } from '@tallyslip/shared';
import type { CategorizationStats, ImportKind } from '@tallyslip/core';
import type { Workspace, IngestOptions } from '../types.js';

/**
 * Metadata for an input file discovered in the imports directory.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
    /** Undefined when no import route matched the filename. */
    kind?: ImportKind;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

export interface PipelineStatistics {
    /** Documents extracted from receipts, SMS and e-mail. */
    extractedDocuments: number;
    /** Messages that were read but are not receipts. */
    notReceipts: number;
    /** Bank rows parsed across all exports. */
    parsedTransactions: number;
    /** Records dropped because the same id was already stored or seen in this run. */
    alreadyStored: number;
    /** New records flagged as likely duplicates of another record. */
    flaggedDuplicates: number;
}

/**
 * Central state object passed through the ingest pipeline.
 */
export interface PipelineState {
    runDate: string;
    workspace: Workspace;
    options: IngestOptions;
    /** Processing time; stamped on ingested and categorized records. */
    now: Date;

    // Accumulated during pipeline execution
    files: InputFile[];
    documents: DocumentRecord[];
    transactions: TransactionRecord[];
    storedDocuments: DocumentRecord[];
    storedTransactions: TransactionRecord[];
    categorizationStats?: CategorizationStats;
    statistics: PipelineStatistics;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
