/**
 * Paper model: what the parser extracts from a PubMed record and what the
 * pipeline hands to the exporters.
 */

/** PubMed identifier (PMID) exactly as ESearch returns it. */
export type RecordIdentifier = string;

/**
 * Raw EFetch response body (PubmedArticleSet XML).
 * Empty string when nothing was requested.
 */
export type RawRecordDocument = string;

/**
 * Author of a paper, in author-list order.
 */
export interface Author {
    /** "ForeName LastName", or the collective name for group authors. May be empty. */
    name: string;

    /** Affiliation strings as printed on the paper (possibly none) */
    affiliations: string[];
}

/**
 * A paper as decoded from one PubmedArticle node, before classification.
 */
export interface ParsedPaper {
    pmid: RecordIdentifier;

    /** Article title, or "Untitled" when the record carries none */
    title: string;

    /** YYYY-MM-DD, YYYY-MM or YYYY; "Unknown" when the record has no date */
    publicationDate: string;

    authors: Author[];
}

/**
 * A parsed paper plus everything the affiliation filter derived from it.
 */
export interface PaperRecord extends ParsedPaper {
    hasNonAcademicAuthor: boolean;

    /** Names of authors with at least one non-academic affiliation */
    nonAcademicAuthors: string[];

    /** Company affiliation strings, unique within the paper, in author order */
    companyAffiliations: string[];

    /** First e-mail address found in any affiliation */
    correspondingAuthorEmail: string | null;
}

/**
 * Ordered papers that passed the filter. Immutable once built.
 */
export type ResultSet = readonly PaperRecord[];

/**
 * A detail node the parser could not decode. Logged and dropped.
 */
export interface ParseSkip {
    /** PMID when the node had one */
    identifier: RecordIdentifier | null;
    reason: string;
}

/**
 * One output row. Keys are the column headers, in column order.
 */
export interface ResultRow {
    'PubmedID': string;
    'Title': string;
    'Publication Date': string;
    'Non-academic Author(s)': string;
    'Company Affiliation(s)': string;
    'Corresponding Author Email': string;
}
