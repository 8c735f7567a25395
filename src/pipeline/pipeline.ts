import type { LiteratureSource, ParsedPaper, PaperRecord, ResultSet } from '../types/index.js';
import {
    DEFAULT_AFFILIATION_RULES,
    extractCompanyName,
    extractEmail,
    isNonAcademic,
    type AffiliationRule,
} from '../classifier/affiliation.js';
import { parseArticleSet } from '../sources/pubmed-parser.js';
import { PubMedClient } from '../sources/pubmed.js';
import { getLogger } from '../utils/logger.js';
import { InvalidInputError } from './errors.js';

export type PipelineStage = 'search' | 'fetch' | 'parse' | 'filter' | 'done';

export interface PipelineOptions {
    /** Literature database to query. Defaults to PubMed. */
    source?: LiteratureSource;

    /** Affiliation rule set. Defaults to the built-in keywords. */
    rules?: readonly AffiliationRule[];
}

/**
 * Classify every author affiliation of a parsed paper and attach the results.
 */
export function toPaperRecord(
    paper: ParsedPaper,
    rules: readonly AffiliationRule[] = DEFAULT_AFFILIATION_RULES
): PaperRecord {
    const nonAcademicAuthors: string[] = [];
    const companyAffiliations: string[] = [];
    let hasNonAcademicAuthor = false;
    let correspondingAuthorEmail: string | null = null;

    for (const author of paper.authors) {
        for (const affiliation of author.affiliations) {
            if (!correspondingAuthorEmail) {
                correspondingAuthorEmail = extractEmail(affiliation);
            }

            if (!isNonAcademic(affiliation, rules)) continue;
            hasNonAcademicAuthor = true;

            if (author.name && !nonAcademicAuthors.includes(author.name)) {
                nonAcademicAuthors.push(author.name);
            }

            const company = extractCompanyName(affiliation, rules);
            if (company && !companyAffiliations.includes(company)) {
                companyAffiliations.push(company);
            }
        }
    }

    return {
        ...paper,
        hasNonAcademicAuthor,
        nonAcademicAuthors,
        companyAffiliations,
        correspondingAuthorEmail,
    };
}

/**
 * FILTER stage: keep exactly the papers with at least one non-academic
 * affiliation, in input order.
 */
export function filterCompanyPapers(
    papers: readonly ParsedPaper[],
    rules: readonly AffiliationRule[] = DEFAULT_AFFILIATION_RULES
): ResultSet {
    return papers
        .map((paper) => toPaperRecord(paper, rules))
        .filter((record) => record.hasNonAcademicAuthor);
}

/**
 * Main pipeline. Find papers with at least one company-affiliated author:
 *
 * 1. SEARCH: query → PMIDs (stop here when there are none)
 * 2. FETCH:  PMIDs → one EFetch document
 * 3. PARSE:  document → papers (malformed records are skipped)
 * 4. FILTER: papers → papers with a non-academic author
 *
 * Retrieval errors propagate unchanged; nothing is retried here.
 */
export async function findCompanyPapers(
    query: string,
    contactId: string,
    options: PipelineOptions = {}
): Promise<ResultSet> {
    if (!query.trim()) throw new InvalidInputError('Query must not be empty');
    if (!contactId.trim()) throw new InvalidInputError('Contact e-mail must not be empty');

    const logger = getLogger();
    const source = options.source ?? new PubMedClient();
    const rules = options.rules ?? DEFAULT_AFFILIATION_RULES;
    const startTime = Date.now();

    let stage: PipelineStage = 'search';
    logger.info({ stage, query, source: source.name }, 'Starting paper search');

    const ids = await source.search(query, contactId);
    if (ids.length === 0) {
        stage = 'done';
        logger.info({ stage }, 'No records match the query');
        return [];
    }

    stage = 'fetch';
    logger.debug({ stage, ids: ids.length }, 'Pipeline stage');
    const document = await source.fetchRecords(ids, contactId);

    stage = 'parse';
    logger.debug({ stage }, 'Pipeline stage');
    const { papers, skipped } = parseArticleSet(document);
    if (skipped.length > 0) {
        logger.warn({ skipped: skipped.length }, 'Some records could not be parsed');
    }

    stage = 'filter';
    logger.debug({ stage, papers: papers.length }, 'Pipeline stage');
    const results = filterCompanyPapers(papers, rules);

    stage = 'done';
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(
        { stage, identifiers: ids.length, parsed: papers.length, matched: results.length, elapsed: `${elapsed}s` },
        'Paper search complete'
    );

    return results;
}
