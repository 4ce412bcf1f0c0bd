import { describe, it, expect, vi } from 'vitest';
import { normalizeArticle, classifyAuthors, splitAffiliations, UNKNOWN_DATE, UNTITLED } from '../pipeline/normalizer.js';
import { collectReportRows, buildReport, classifierFromConfig } from '../pipeline/report-builder.js';
import { DEFAULT_CONFIG, type ArticleSource, type PharmaPapersConfig, type RawArticle } from '../types/index.js';

function article(overrides: Partial<RawArticle> = {}): RawArticle {
    return {
        id: '1',
        title: 'Test Article',
        publicationDate: '2023 Jan',
        authors: [],
        ...overrides,
    };
}

describe('normalizeArticle', () => {
    it('should build a row for a single company author with no date', () => {
        const row = normalizeArticle({
            id: '35270448',
            title: 'Metabolic Treatment of Wolfram Syndrome',
            authors: [{ name: 'Iafusco, Fernanda', affiliation: 'CEINGE Advanced Biotech' }],
        });

        expect(row).toEqual({
            id: '35270448',
            title: 'Metabolic Treatment of Wolfram Syndrome',
            publicationDate: 'Unknown',
            nonAcademicAuthors: ['Iafusco, Fernanda'],
            companyAffiliations: ['CEINGE Advanced Biotech'],
            correspondingEmail: null,
        });
    });

    it('should keep only company-affiliated authors', () => {
        const row = normalizeArticle(article({
            authors: [
                { name: 'Smith, Anna', affiliation: 'Pfizer Inc, USA' },
                { name: 'Jones, Ben', affiliation: 'Dept. of Medicine, Harvard University' },
            ],
        }));

        expect(row?.nonAcademicAuthors).toEqual(['Smith, Anna']);
        expect(row?.companyAffiliations).toEqual(['Pfizer Inc']);
    });

    it('should return null when every author is academic', () => {
        expect(normalizeArticle(article({
            authors: [
                { name: 'Jones, Ben', affiliation: 'Dept. of Medicine, Harvard University' },
                { name: 'Park, Min', affiliation: 'Seoul National University Hospital' },
            ],
        }))).toBeNull();
    });

    it('should treat a missing author list as no company found', () => {
        expect(normalizeArticle(article({ authors: undefined }))).toBeNull();
        expect(normalizeArticle(article({ authors: null }))).toBeNull();
        expect(normalizeArticle(article({ authors: [] }))).toBeNull();
    });

    it('should de-duplicate company affiliations and author names', () => {
        const row = normalizeArticle(article({
            authors: [
                { name: 'Smith, Anna', affiliation: 'Acme Therapeutics, Boston' },
                { name: 'Lee, Ray', affiliation: 'Acme Therapeutics, Cambridge' },
                { name: 'Smith, Anna', affiliation: 'Acme Therapeutics, Boston' },
            ],
        }));

        expect(row?.nonAcademicAuthors).toEqual(['Smith, Anna', 'Lee, Ray']);
        expect(row?.companyAffiliations).toEqual(['Acme Therapeutics']);
    });

    it('should take the first email in author order, from any author', () => {
        const row = normalizeArticle(article({
            authors: [
                { name: 'Jones, Ben', affiliation: 'Harvard University, Boston. ben@harvard.edu' },
                { name: 'Smith, Anna', affiliation: 'Pfizer Inc, USA. anna.smith@pfizer.com' },
            ],
        }));

        expect(row?.correspondingEmail).toBe('ben@harvard.edu');
    });

    it('should keep searching for an email until one is found', () => {
        const row = normalizeArticle(article({
            authors: [
                { name: 'Smith, Anna', affiliation: 'Pfizer Inc, USA' },
                { name: 'Lee, Ray', affiliation: 'Acme Therapeutics. ray@acmetx.com' },
                { name: 'Kim, Jo', affiliation: 'Zenith Bio GmbH. jo@zenith.de' },
            ],
        }));

        expect(row?.correspondingEmail).toBe('ray@acmetx.com');
    });

    it('should classify each affiliation of a multi-affiliation author', () => {
        const row = normalizeArticle(article({
            authors: [{ name: 'Rossi, Maria', affiliation: 'Harvard Medical School, Boston; Acme Therapeutics, Boston' }],
        }));

        expect(row?.nonAcademicAuthors).toEqual(['Rossi, Maria']);
        expect(row?.companyAffiliations).toEqual(['Acme Therapeutics']);
    });

    it('should substitute Unknown for blank dates and keep partial ones', () => {
        const authors = [{ name: 'Smith, Anna', affiliation: 'Pfizer Inc' }];
        expect(normalizeArticle(article({ publicationDate: '  ', authors }))?.publicationDate).toBe(UNKNOWN_DATE);
        expect(normalizeArticle(article({ publicationDate: null, authors }))?.publicationDate).toBe(UNKNOWN_DATE);
        expect(normalizeArticle(article({ publicationDate: '2022 Mar', authors }))?.publicationDate).toBe('2022 Mar');
    });

    it('should skip author entries that are not objects', () => {
        const record: RawArticle = JSON.parse(
            '{"id":"9","title":"T","authors":[null,{"name":"X","affiliation":"Pfizer Inc"}]}'
        );

        expect(normalizeArticle(record)).toEqual({
            id: '9',
            title: 'T',
            publicationDate: UNKNOWN_DATE,
            nonAcademicAuthors: ['X'],
            companyAffiliations: ['Pfizer Inc'],
            correspondingEmail: null,
        });
    });

    it('should fall back to defaults for fields of the wrong type', () => {
        const record: RawArticle = JSON.parse(JSON.stringify({
            id: '10',
            title: 42,
            publicationDate: 2021,
            authors: [
                7,
                'Pfizer',
                { name: 5, affiliation: 'Moderna, Cambridge, MA' },
                { name: 'Young, Y', affiliation: ['Pfizer Inc'] },
            ],
        }));

        expect(normalizeArticle(record)).toEqual({
            id: '10',
            title: UNTITLED,
            publicationDate: UNKNOWN_DATE,
            nonAcademicAuthors: [],
            companyAffiliations: ['Moderna'],
            correspondingEmail: null,
        });
    });

    it('should use the injected classifier', () => {
        const classify = vi.fn().mockReturnValue({ isCompany: true, companyName: null });
        const row = normalizeArticle(article({ authors: [{ name: 'Smith, Anna', affiliation: 'Anywhere' }] }), classify);

        expect(classify).toHaveBeenCalledWith('Anywhere');
        expect(row?.nonAcademicAuthors).toEqual(['Smith, Anna']);
        expect(row?.companyAffiliations).toEqual([]);
    });
});

describe('classifyAuthors', () => {
    it('should default missing affiliations to empty and keep order', () => {
        const authors = classifyAuthors([
            { name: 'A' },
            { name: 'B', affiliation: null },
            { name: 'C', affiliation: 'Pfizer Inc, USA' },
        ]);

        expect(authors).toEqual([
            { name: 'A', affiliation: '', isCompany: false, companyName: null },
            { name: 'B', affiliation: '', isCompany: false, companyName: null },
            { name: 'C', affiliation: 'Pfizer Inc, USA', isCompany: true, companyName: 'Pfizer Inc' },
        ]);
    });

    it('should skip malformed entries', () => {
        expect(classifyAuthors([null, 'Pfizer Inc', { name: 'A' }])).toEqual([
            { name: 'A', affiliation: '', isCompany: false, companyName: null },
        ]);
    });

    it('splitAffiliations should drop empty parts', () => {
        expect(splitAffiliations(' A, Boston ;; B ')).toEqual(['A, Boston', 'B']);
        expect(splitAffiliations('')).toEqual([]);
    });
});

describe('collectReportRows', () => {
    it('should keep input order and drop academic-only articles', () => {
        const rows = collectReportRows([
            article({ id: '3', authors: [{ name: 'X', affiliation: 'Moderna, Cambridge' }] }),
            article({ id: '1', authors: [{ name: 'Y', affiliation: 'Oxford University' }] }),
            article({ id: '2', authors: [{ name: 'Z', affiliation: 'Amgen Inc.' }] }),
        ]);

        expect(rows.map((r) => r.id)).toEqual(['3', '2']);
        expect(rows.map((r) => r.companyAffiliations)).toEqual([['Moderna'], ['Amgen Inc.']]);
    });
});

describe('buildReport', () => {
    const config: PharmaPapersConfig = { ...DEFAULT_CONFIG, query: 'wolfram syndrome', maxResults: 5, noCache: true };

    function fakeSource(ids: string[], articles: RawArticle[]) {
        return {
            name: 'Fake',
            search: vi.fn().mockResolvedValue(ids),
            fetchArticles: vi.fn().mockResolvedValue(articles),
        } satisfies ArticleSource;
    }

    it('should search, fetch and normalize', async () => {
        const source = fakeSource(['10', '11'], [
            article({ id: '10', authors: [{ name: 'X', affiliation: 'Acme Therapeutics' }] }),
            article({ id: '11', authors: [{ name: 'Y', affiliation: 'Yale University' }] }),
        ]);

        const result = await buildReport(config, source);

        expect(source.search).toHaveBeenCalledWith('wolfram syndrome', 5);
        expect(source.fetchArticles).toHaveBeenCalledWith(['10', '11']);
        expect(result.searched).toBe(2);
        expect(result.fetched).toBe(2);
        expect(result.rows.map((r) => r.id)).toEqual(['10']);
    });

    it('should skip fetching when the search finds nothing', async () => {
        const source = fakeSource([], []);
        const result = await buildReport(config, source);

        expect(source.fetchArticles).not.toHaveBeenCalled();
        expect(result).toEqual({ rows: [], searched: 0, fetched: 0 });
    });

    it('should propagate source errors', async () => {
        const source = fakeSource([], []);
        source.search.mockRejectedValue(new Error('esearch down'));

        await expect(buildReport(config, source)).rejects.toThrow('esearch down');
    });

    it('should apply lexicon entries from config', async () => {
        const classify = classifierFromConfig({ lexicon: { knownCompanies: ['Orbit Labs'] } });
        expect(classify('Orbit Labs, Leiden')).toEqual({ isCompany: true, companyName: 'Orbit Labs' });
        expect(classify('Pfizer Inc, USA').isCompany).toBe(true);
    });
});
