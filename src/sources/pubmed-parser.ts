import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Author, ParsedPaper, ParseSkip, RawRecordDocument } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { innerText, normalizeWhitespace } from './utils.js';

export const UNTITLED = 'Untitled';
export const UNKNOWN_DATE = 'Unknown';

/**
 * Elements that may repeat under their parent. Always decoded as arrays so a
 * single occurrence reads the same as many.
 */
const REPEATED_TAGS = new Set(['PubmedArticle', 'PubmedBookArticle', 'Author', 'AffiliationInfo', 'ArticleDate']);

/**
 * Elements whose content may carry inline markup. Kept as raw inner XML and
 * flattened by `innerText`, so "<i>in vivo</i>" keeps its place in the sentence.
 */
const MARKUP_TAGS = ['ArticleTitle', 'Affiliation', 'CollectiveName'];

const xmlParser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    htmlEntities: true,
    isArray: (tagName: string) => REPEATED_TAGS.has(tagName),
    stopNodes: MARKUP_TAGS.map((tag) => `*.${tag}`),
});

// ─── Typed record tree ───────────────────────────────────

/** PubDate / ArticleDate fields as printed. */
export interface DateNode {
    year?: string;
    month?: string;
    day?: string;
    /** Free-form date, e.g. "1998 Dec-1999 Jan" */
    medlineDate?: string;
}

export interface AuthorNode {
    lastName?: string;
    foreName?: string;
    initials?: string;
    collectiveName?: string;
    affiliations: string[];
}

/**
 * The parts of a PubmedArticle the pipeline reads.
 */
export interface PubmedArticleNode {
    pmid: string;
    title?: string;
    pubDate?: DateNode;
    articleDate?: DateNode;
    authors: AuthorNode[];
    /** Legacy article-level affiliation; belongs to the first author */
    articleAffiliation?: string;
}

type ReadResult =
    | { ok: true; node: PubmedArticleNode }
    | { ok: false; skip: ParseSkip };

// ─── Accessors over the decoded XML ──────────────────────

type XmlNode = { readonly [tag: string]: unknown };

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function first(value: unknown): unknown {
    return Array.isArray(value) ? value[0] : value;
}

function child(node: XmlNode | undefined, tag: string): XmlNode | undefined {
    const value = first(node?.[tag]);
    return isNode(value) ? value : undefined;
}

function children(node: XmlNode | undefined, tag: string): XmlNode[] {
    const value = node?.[tag];
    if (value === undefined) return [];
    return (Array.isArray(value) ? value : [value]).filter(isNode);
}

function asText(value: unknown, markup: boolean): string | undefined {
    if (typeof value !== 'string') return undefined;
    const text = markup ? innerText(value) : normalizeWhitespace(value);
    return text || undefined;
}

/** Text of the first `tag` child, or undefined when absent or empty. */
function text(node: XmlNode | undefined, tag: string): string | undefined {
    return asText(first(node?.[tag]), MARKUP_TAGS.includes(tag));
}

/** Text of every `tag` child. */
function texts(node: XmlNode | undefined, tag: string): string[] {
    const value = node?.[tag];
    if (value === undefined) return [];
    const markup = MARKUP_TAGS.includes(tag);
    return (Array.isArray(value) ? value : [value])
        .map((v) => asText(v, markup))
        .filter((t): t is string => t !== undefined);
}

// ─── Tree construction ───────────────────────────────────

function readDate(node: XmlNode | undefined): DateNode | undefined {
    if (!node) return undefined;
    return {
        year: text(node, 'Year'),
        month: text(node, 'Month'),
        day: text(node, 'Day'),
        medlineDate: text(node, 'MedlineDate'),
    };
}

function readAuthor(node: XmlNode): AuthorNode {
    const affiliations = [
        ...children(node, 'AffiliationInfo').flatMap((info) => texts(info, 'Affiliation')),
        ...texts(node, 'Affiliation'),
    ];

    return {
        lastName: text(node, 'LastName'),
        foreName: text(node, 'ForeName'),
        initials: text(node, 'Initials'),
        collectiveName: text(node, 'CollectiveName'),
        affiliations,
    };
}

/**
 * Narrow one decoded PubmedArticle into the typed tree.
 * Fails only when the nodes every record must have are missing.
 */
export function readArticleNode(raw: XmlNode): ReadResult {
    const citation = child(raw, 'MedlineCitation');
    if (!citation) {
        return { ok: false, skip: { identifier: null, reason: 'missing MedlineCitation' } };
    }

    const pmid = text(citation, 'PMID');
    if (!pmid) {
        return { ok: false, skip: { identifier: null, reason: 'missing PMID' } };
    }

    const article = child(citation, 'Article');
    if (!article) {
        return { ok: false, skip: { identifier: pmid, reason: 'missing Article' } };
    }

    const issue = child(child(article, 'Journal'), 'JournalIssue');

    return {
        ok: true,
        node: {
            pmid,
            title: text(article, 'ArticleTitle'),
            pubDate: readDate(child(issue, 'PubDate')),
            articleDate: readDate(child(article, 'ArticleDate')),
            authors: children(child(article, 'AuthorList'), 'Author').map(readAuthor),
            articleAffiliation: text(article, 'Affiliation'),
        },
    };
}

// ─── Field extraction ────────────────────────────────────

const MONTHS: Record<string, string> = {
    jan: '01', feb: '02', mar: '03', apr: '04', may: '05', jun: '06',
    jul: '07', aug: '08', sep: '09', oct: '10', nov: '11', dec: '12',
};

/**
 * "Mar", "March", "3", "03" → "03". Seasons and other text → undefined.
 */
export function normalizeMonth(month: string): string | undefined {
    if (/^\d{1,2}$/.test(month)) {
        const n = parseInt(month, 10);
        return n >= 1 && n <= 12 ? String(n).padStart(2, '0') : undefined;
    }
    return MONTHS[month.slice(0, 3).toLowerCase()];
}

/**
 * Best-effort ISO-style date: YYYY-MM-DD, YYYY-MM or YYYY.
 * Undefined when there is no usable year.
 */
export function formatDate(date: DateNode | undefined): string | undefined {
    if (!date) return undefined;

    let { year, month, day } = date;
    if (!year && date.medlineDate) {
        const match = date.medlineDate.match(/^(\d{4})(?:\s+([A-Za-z]{3,}|\d{1,2}))?/);
        year = match?.[1];
        month = match?.[2];
        day = undefined;
    }

    if (!year || !/^\d{4}$/.test(year)) return undefined;

    const mm = month ? normalizeMonth(month) : undefined;
    if (!mm) return year;

    const dd = day && /^\d{1,2}$/.test(day) ? day.padStart(2, '0') : undefined;
    return dd ? `${year}-${mm}-${dd}` : `${year}-${mm}`;
}

export function authorName(author: AuthorNode): string {
    if (author.collectiveName) return author.collectiveName;
    return `${author.foreName ?? author.initials ?? ''} ${author.lastName ?? ''}`.trim();
}

/**
 * Flatten the typed tree into the paper model.
 */
export function toParsedPaper(node: PubmedArticleNode): ParsedPaper {
    const authors: Author[] = node.authors.map((a) => ({
        name: authorName(a),
        affiliations: [...a.affiliations],
    }));

    // Older records print one affiliation for the whole article (the first author's)
    const firstAuthor = authors[0];
    if (node.articleAffiliation && firstAuthor && authors.every((a) => a.affiliations.length === 0)) {
        firstAuthor.affiliations.push(node.articleAffiliation);
    }

    return {
        pmid: node.pmid,
        title: node.title ?? UNTITLED,
        publicationDate: formatDate(node.pubDate) ?? formatDate(node.articleDate) ?? UNKNOWN_DATE,
        authors,
    };
}

/**
 * Decode an EFetch PubmedArticleSet document.
 *
 * Papers come back in document order. Records that cannot be decoded are
 * logged and reported in `skipped`; they never fail the batch. A document
 * that is not well-formed yields no papers and a single skip.
 */
export function parseArticleSet(xml: RawRecordDocument): { papers: ParsedPaper[]; skipped: ParseSkip[] } {
    const papers: ParsedPaper[] = [];
    const skipped: ParseSkip[] = [];

    if (!xml.trim()) return { papers, skipped };

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const skip: ParseSkip = {
            identifier: null,
            reason: `malformed XML at line ${validation.err.line}: ${validation.err.msg}`,
        };
        getLogger().warn({ ...skip }, 'Cannot parse PubMed document');
        return { papers, skipped: [skip] };
    }

    const root: unknown = xmlParser.parse(xml);
    const articleSet = isNode(root) ? child(root, 'PubmedArticleSet') : undefined;
    if (!articleSet && !(isNode(root) && 'PubmedArticleSet' in root)) {
        getLogger().warn('Document has no PubmedArticleSet root');
    }

    for (const raw of children(articleSet, 'PubmedArticle')) {
        const result = readArticleNode(raw);
        if (result.ok) {
            papers.push(toParsedPaper(result.node));
        } else {
            getLogger().warn({ ...result.skip }, 'Skipping malformed PubMed record');
            skipped.push(result.skip);
        }
    }

    const books = children(articleSet, 'PubmedBookArticle').length;
    if (books > 0) {
        getLogger().debug({ books }, 'Ignoring book records');
    }

    getLogger().debug({ parsed: papers.length, skipped: skipped.length }, 'Parsed PubMed records');
    return { papers, skipped };
}
