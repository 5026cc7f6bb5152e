import type { KeywordSet } from '../models/Analysis';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { EntityLabel, NlpModel } from './nlpModel';
import { TermScore, TfidfVectorizer } from './tfidf';

export const DEFAULT_TOP_N = 20;

const RELEVANT_ENTITY_LABELS: ReadonlySet<EntityLabel> = new Set<EntityLabel>([
    'ORG',
    'PRODUCT',
    'GPE',
    'PERSON',
    'NORP'
]);

/**
 * Sentences form the corpus; with fewer than two, lines are used instead.
 */
export function splitCorpus(text: string): string[] {
    const sentences = text
        .split('.')
        .map((sentence) => sentence.trim())
        .filter(Boolean);

    if (sentences.length >= 2) {
        return sentences;
    }

    return text
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean);
}

/**
 * Ranks salient terms in a text: TF-IDF terms first, then named entities the
 * statistics missed.
 */
export class KeywordExtractor {
    constructor(private readonly model: NlpModel) {}

    extract(text: string, topN: number = DEFAULT_TOP_N): KeywordSet {
        if (!text || !text.trim()) {
            logger.warn('Empty text provided for keyword extraction');
            return [];
        }

        const combined: string[] = [];
        const seen = new Set<string>();
        const add = (keyword: string) => {
            const key = keyword.toLowerCase();
            if (combined.length < topN && !seen.has(key)) {
                seen.add(key);
                combined.push(key);
            }
        };

        this.statisticalKeywords(text, topN).forEach(({ term }) => add(term));
        this.entityKeywords(text).forEach(add);

        return Object.freeze(combined);
    }

    statisticalKeywords(text: string, topN: number = DEFAULT_TOP_N): TermScore[] {
        try {
            const corpus = splitCorpus(text);
            if (corpus.length === 0) {
                logger.warn('No sentences found for TF-IDF analysis');
                return [];
            }

            return new TfidfVectorizer().fitSummedScores(corpus).slice(0, topN);
        } catch (error) {
            logger.error('TF-IDF extraction failed', { error: errorMessage(error) });
            return [];
        }
    }

    entityKeywords(text: string): string[] {
        try {
            const keywords = new Set<string>();

            for (const entity of this.model.entities(text)) {
                if (!RELEVANT_ENTITY_LABELS.has(entity.label)) {
                    continue;
                }
                const keyword = entity.text.trim().toLowerCase();
                if (keyword.length > 1) {
                    keywords.add(keyword);
                }
            }

            logger.debug('Extracted entity keywords', { model: this.model.name, count: keywords.size });
            return [...keywords];
        } catch (error) {
            logger.error('Entity extraction failed', { model: this.model.name, error: errorMessage(error) });
            return [];
        }
    }
}
