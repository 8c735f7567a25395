import { describe, it, expect } from 'vitest';
import { decodeEntities, innerText, normalizeWhitespace, stripMarkup } from '../sources/utils.js';

describe('Source Utils', () => {
    describe('decodeEntities', () => {
        it('should decode numeric references', () => {
            expect(decodeEntities('Caf&#xe9; M&#252;nchen')).toBe('Café München');
        });

        it('should decode the predefined entities', () => {
            expect(decodeEntities('a &lt; b &amp;&amp; c &gt; d')).toBe('a < b && c > d');
            expect(decodeEntities('&quot;x&quot; &apos;y&apos;')).toBe('"x" \'y\'');
        });

        it('should leave unknown entities alone', () => {
            expect(decodeEntities('&beta;-catenin')).toBe('&beta;-catenin');
            expect(decodeEntities('AT&T')).toBe('AT&T');
        });
    });

    describe('stripMarkup', () => {
        it('should drop tags and keep their text', () => {
            expect(stripMarkup('Role of <i>BRCA1</i> in H<sub>2</sub>O<sub>2</sub> stress')).toBe('Role of BRCA1 in H2O2 stress');
        });
    });

    describe('normalizeWhitespace', () => {
        it('should collapse runs and trim', () => {
            expect(normalizeWhitespace('  Department of\n    Chemistry\t ')).toBe('Department of Chemistry');
        });
    });

    describe('innerText', () => {
        it('should flatten raw element content', () => {
            expect(innerText('The <i>TP53</i> &amp; MDM2\n  axis')).toBe('The TP53 & MDM2 axis');
        });

        it('should keep CDATA content as written', () => {
            expect(innerText('<![CDATA[AT&amp;T <Labs>]]> and <i>Bell</i> &amp; Co')).toBe('AT&amp;T <Labs> and Bell & Co');
            expect(innerText('<![CDATA[]]>')).toBe('');
        });

        it('should not treat decoded brackets as markup', () => {
            expect(innerText('IC50 &lt;5 nM in <b>vitro</b>')).toBe('IC50 <5 nM in vitro');
        });
    });
});
