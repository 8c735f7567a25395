import type { ClassifierConfig } from '../types/index.js';

/**
 * Affiliation classifier.
 *
 * A fixed-keyword heuristic, not an authoritative lookup. Rules are an ordered
 * list of (pattern, verdict) pairs and the first match wins. Academic rules
 * always precede commercial ones, so any academic marker vetoes the commercial
 * markers. Text that matches nothing is academic: without a commercial signal
 * there is nothing to assert.
 */

export type AffiliationVerdict = 'academic' | 'commercial';

export interface AffiliationRule {
    readonly pattern: RegExp;
    readonly verdict: AffiliationVerdict;
}

const ACADEMIC_PATTERNS: readonly RegExp[] = [
    /universit/i,          // university, universität, université, universidad
    /univerzita/i,
    /college/i,
    /school/i,             // school of medicine, medical school
    /hospital/i,
    /\bdept\b/i,
    /department/i,
    /faculty/i,
    /\bacadem/i,           // academy, academic
    /national institutes/i,
    /institute of technology/i,
    /medical cent(?:er|re)/i,
];

const COMMERCIAL_PATTERNS: readonly RegExp[] = [
    /\binc\b/i,
    /\bltd\b/i,
    /\bllc\b/i,
    /\bcorp(?:oration)?\b/i,
    /\bco\.(?!\w)/i,
    /\bcompany\b/i,
    /\bgmbh\b/i,
    /\bag\b/i,
    /\bplc\b/i,
    /pharma(?!c[oy])/i,    // pharma, pharmaceuticals; not pharmacy or pharmacology
    /biotech/i,
    /therapeutics/i,
    /diagnostics/i,
    /biosciences/i,
    /\blabs\b/i,
    /laboratories/i,
];

export const DEFAULT_AFFILIATION_RULES: readonly AffiliationRule[] = [
    ...ACADEMIC_PATTERNS.map((pattern) => ({ pattern, verdict: 'academic' as const })),
    ...COMMERCIAL_PATTERNS.map((pattern) => ({ pattern, verdict: 'commercial' as const })),
];

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const TRAILING_EMAIL = /\s*(?:Electronic address:\s*)?[\w.+-]+@[\w-]+(?:\.[\w-]+)+[\s.]*$/i;

/**
 * Build a rule set from the defaults plus configured keywords.
 * Extra keywords match as case-insensitive substrings.
 */
export function buildAffiliationRules(extra?: Partial<ClassifierConfig>): readonly AffiliationRule[] {
    const academic = (extra?.academicKeywords ?? []).filter((k) => k.trim());
    const commercial = (extra?.commercialKeywords ?? []).filter((k) => k.trim());

    if (academic.length === 0 && commercial.length === 0) {
        return DEFAULT_AFFILIATION_RULES;
    }

    const keywordRule = (keyword: string, verdict: AffiliationVerdict): AffiliationRule => ({
        pattern: new RegExp(escapeRegExp(keyword.trim()), 'i'),
        verdict,
    });

    return [
        ...ACADEMIC_PATTERNS.map((pattern) => ({ pattern, verdict: 'academic' as const })),
        ...academic.map((k) => keywordRule(k, 'academic')),
        ...COMMERCIAL_PATTERNS.map((pattern) => ({ pattern, verdict: 'commercial' as const })),
        ...commercial.map((k) => keywordRule(k, 'commercial')),
    ];
}

/**
 * Classify one affiliation string. Empty or missing text is academic.
 */
export function classifyAffiliation(
    affiliation: string | null | undefined,
    rules: readonly AffiliationRule[] = DEFAULT_AFFILIATION_RULES
): AffiliationVerdict {
    const text = affiliation?.trim();
    if (!text) return 'academic';

    const match = rules.find((rule) => rule.pattern.test(text));
    return match?.verdict ?? 'academic';
}

export function isNonAcademic(
    affiliation: string | null | undefined,
    rules: readonly AffiliationRule[] = DEFAULT_AFFILIATION_RULES
): boolean {
    return classifyAffiliation(affiliation, rules) === 'commercial';
}

/**
 * The string reported in the company column: the affiliation itself, minus
 * any contact e-mail appended to it. Null for academic affiliations.
 */
export function extractCompanyName(
    affiliation: string | null | undefined,
    rules: readonly AffiliationRule[] = DEFAULT_AFFILIATION_RULES
): string | null {
    if (!affiliation || !isNonAcademic(affiliation, rules)) return null;

    const withoutEmail = affiliation.replace(TRAILING_EMAIL, '');
    const name = withoutEmail === affiliation
        ? affiliation.trim()
        : withoutEmail.replace(/[\s.,;:]+$/, '').trim();

    return name || null;
}

/**
 * First e-mail address in an affiliation string, if any.
 */
export function extractEmail(affiliation: string | null | undefined): string | null {
    if (!affiliation) return null;
    return affiliation.match(EMAIL_PATTERN)?.[0] ?? null;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
