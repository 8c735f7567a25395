import { writeFileSync } from 'node:fs';
import type { PaperRecord, ResultRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'csv' | 'table';

export const COLUMNS: readonly (keyof ResultRow)[] = [
    'PubmedID',
    'Title',
    'Publication Date',
    'Non-academic Author(s)',
    'Company Affiliation(s)',
    'Corresponding Author Email',
];

const LIST_SEPARATOR = '; ';

// ─── Row mapping ─────────────────────────────────────────

export function toResultRow(record: PaperRecord): ResultRow {
    return {
        'PubmedID': record.pmid,
        'Title': record.title,
        'Publication Date': record.publicationDate,
        'Non-academic Author(s)': record.nonAcademicAuthors.join(LIST_SEPARATOR),
        'Company Affiliation(s)': record.companyAffiliations.join(LIST_SEPARATOR),
        'Corresponding Author Email': record.correspondingAuthorEmail ?? '',
    };
}

// ─── Format Implementations ─────────────────────────────

function csvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Header row plus one row per paper.
 */
export function exportCSV(records: readonly PaperRecord[]): string {
    let csv = COLUMNS.map(csvField).join(',') + '\n';
    for (const record of records) {
        const row = toResultRow(record);
        csv += COLUMNS.map((column) => csvField(row[column])).join(',') + '\n';
    }
    return csv;
}

/**
 * Human-readable listing for the terminal, one block per paper.
 */
export function exportTable(records: readonly PaperRecord[]): string {
    const width = Math.max(...COLUMNS.map((c) => c.length));
    const blocks = records.map((record, i) => {
        const row = toResultRow(record);
        const lines = COLUMNS.map((column) => `  ${column.padEnd(width)}  ${row[column] || '-'}`);
        return [`[${i + 1}]`, ...lines].join('\n');
    });
    return blocks.join('\n\n') + '\n';
}

// ─── Main Export Function ────────────────────────────────

/**
 * Write the result set to a file.
 */
export function exportResults(
    records: readonly PaperRecord[],
    outputPath: string,
    format: ExportFormat = 'csv'
): void {
    const content = format === 'csv' ? exportCSV(records) : exportTable(records);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ format, outputPath, papers: records.length }, 'Results exported');
}
