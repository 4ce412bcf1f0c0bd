import { XMLParser } from 'fast-xml-parser';
import type { RawArticle, RawAuthor } from '../types/index.js';
import { SourceError, asList, child, formatAuthorName, markupTextOf, textOf } from './utils.js';

const ARRAY_TAGS = new Set(['PubmedArticle', 'PubmedBookArticle', 'Author', 'AffiliationInfo', 'Affiliation']);

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    trimValues: true,
    // Titles and affiliations may carry inline markup (<i>, <sup>); keep it raw and strip later
    stopNodes: ['*.ArticleTitle', '*.Affiliation'],
    isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

/**
 * "2022 Mar 15", "2022 Mar", "2021 Nov-Dec" (MedlineDate), or null.
 */
function parsePubDate(pubDate: unknown): string | null {
    const medlineDate = textOf(child(pubDate, 'MedlineDate'));
    if (medlineDate) return medlineDate;

    const parts = ['Year', 'Month', 'Day']
        .map((key) => textOf(child(pubDate, key)))
        .filter((part) => part.length > 0);
    return parts.length > 0 ? parts.join(' ') : null;
}

function parseAuthor(author: unknown): RawAuthor | null {
    const name = formatAuthorName(
        textOf(child(author, 'LastName')),
        textOf(child(author, 'ForeName')),
        textOf(child(author, 'Initials'))
    ) || textOf(child(author, 'CollectiveName'));
    if (!name) return null;

    // Older records put Affiliation directly on the author
    const affiliations = [
        ...asList(child(author, 'AffiliationInfo')).flatMap((info) => asList(child(info, 'Affiliation'))),
        ...asList(child(author, 'Affiliation')),
    ]
        .map(markupTextOf)
        .filter((affiliation) => affiliation.length > 0);

    return affiliations.length > 0
        ? { name, affiliation: affiliations.join('; ') }
        : { name };
}

function parseArticle(entry: unknown): RawArticle | null {
    const citation = child(entry, 'MedlineCitation');
    const id = textOf(child(citation, 'PMID'));
    if (!id) return null;

    const article = child(citation, 'Article');
    const pubDate = child(child(child(article, 'Journal'), 'JournalIssue'), 'PubDate');
    const authorList = child(article, 'AuthorList');

    return {
        id,
        title: markupTextOf(child(article, 'ArticleTitle')) || 'Untitled',
        publicationDate: parsePubDate(pubDate),
        // No AuthorList element at all is kept distinct from an empty one
        authors: authorList === undefined
            ? null
            : asList(child(authorList, 'Author'))
                .map(parseAuthor)
                .filter((author): author is RawAuthor => author !== null),
    };
}

/**
 * Parse an efetch PubmedArticleSet document into raw articles, in document order.
 * Book records (PubmedBookArticle) are skipped.
 */
export function parsePubMedXml(xml: string): RawArticle[] {
    let document: unknown;
    try {
        document = parser.parse(xml);
    } catch (error) {
        throw new SourceError('Malformed PubMed XML', 'pubmed', error);
    }

    const articleSet = child(document, 'PubmedArticleSet');
    if (articleSet === undefined) {
        throw new SourceError('PubMed response has no PubmedArticleSet', 'pubmed');
    }

    return asList(child(articleSet, 'PubmedArticle'))
        .map(parseArticle)
        .filter((article): article is RawArticle => article !== null);
}
