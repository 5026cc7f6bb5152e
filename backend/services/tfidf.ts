import stopWordList from '../data/stopWords.json';

export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export interface TfidfOptions {
    maxFeatures: number;
    stopWords: ReadonlySet<string>;
    ngramRange: [number, number];
}

export interface TermScore {
    term: string;
    score: number;
}

const DEFAULT_OPTIONS: TfidfOptions = {
    maxFeatures: 100,
    stopWords: ENGLISH_STOP_WORDS,
    ngramRange: [1, 2]
};

// Runs of two or more word characters
const TOKEN_PATTERN = /[\p{L}\p{M}\p{N}_]{2,}/gu;

export class EmptyVocabularyError extends Error {
    constructor() {
        super('Empty vocabulary; the documents contain only stop words or no tokens');
        this.name = 'EmptyVocabularyError';
    }
}

const byTerm = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Term weighting over a small corpus: raw counts, smoothed idf
 * `ln((1 + n) / (1 + df)) + 1` and L2-normalised rows. One instance per fit;
 * nothing is kept between calls.
 */
export class TfidfVectorizer {
    private readonly options: TfidfOptions;

    constructor(options: Partial<TfidfOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    analyze(document: string): string[] {
        const tokens = (document.toLowerCase().match(TOKEN_PATTERN) ?? []).filter(
            (token) => !this.options.stopWords.has(token)
        );
        const [minN, maxN] = this.options.ngramRange;
        const terms: string[] = [];

        for (let n = minN; n <= maxN; n++) {
            for (let i = 0; i + n <= tokens.length; i++) {
                terms.push(tokens.slice(i, i + n).join(' '));
            }
        }
        return terms;
    }

    /**
     * Fits the corpus and returns each vocabulary term with its weight summed
     * over all documents, highest first and ties alphabetical.
     * @throws EmptyVocabularyError when no document yields a term
     */
    fitSummedScores(documents: readonly string[]): TermScore[] {
        const counts = documents.map((document) => {
            const termCounts = new Map<string, number>();
            for (const term of this.analyze(document)) {
                termCounts.set(term, (termCounts.get(term) ?? 0) + 1);
            }
            return termCounts;
        });

        const vocabulary = this.buildVocabulary(counts);
        if (vocabulary.length === 0) {
            throw new EmptyVocabularyError();
        }

        const n = documents.length;
        const idf = new Map<string, number>();
        for (const term of vocabulary) {
            const df = counts.filter((termCounts) => termCounts.has(term)).length;
            idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
        }

        const sums = new Map<string, number>(vocabulary.map((term) => [term, 0]));
        for (const termCounts of counts) {
            const row = vocabulary.map((term) => (termCounts.get(term) ?? 0) * (idf.get(term) ?? 0));
            const norm = Math.sqrt(row.reduce((total, weight) => total + weight * weight, 0));
            if (norm === 0) {
                continue;
            }
            vocabulary.forEach((term, index) => {
                sums.set(term, (sums.get(term) ?? 0) + row[index] / norm);
            });
        }

        return vocabulary
            .map((term) => ({ term, score: sums.get(term) ?? 0 }))
            .sort((a, b) => b.score - a.score || byTerm(a.term, b.term));
    }

    // Most frequent terms across the corpus, returned in alphabetical order
    private buildVocabulary(counts: ReadonlyArray<Map<string, number>>): string[] {
        const totals = new Map<string, number>();
        for (const termCounts of counts) {
            for (const [term, count] of termCounts) {
                totals.set(term, (totals.get(term) ?? 0) + count);
            }
        }

        return [...totals.entries()]
            .sort((a, b) => b[1] - a[1] || byTerm(a[0], b[0]))
            .slice(0, this.options.maxFeatures)
            .map(([term]) => term)
            .sort(byTerm);
    }
}
