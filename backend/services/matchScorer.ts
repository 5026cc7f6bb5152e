import type { MatchResult } from '../models/Analysis';
import { logger } from '../utils/logger';
import { DEFAULT_TOP_N, KeywordExtractor } from './keywordExtractor';

const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `keyword` occurs in `text` as a whole token sequence, not inside a
 * longer word ("java" does not match "javascript").
 */
export function containsWord(text: string, keyword: string): boolean {
    const pattern = new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(keyword)}(?!${WORD_CHAR})`, 'u');
    return pattern.test(text);
}

export function emptyMatchResult(): MatchResult {
    return {
        score: 0,
        matchedKeywords: [],
        missingKeywords: [],
        totalKeywords: 0,
        matchedCount: 0,
        missingCount: 0
    };
}

export class MatchScorer {
    constructor(private readonly extractor: KeywordExtractor) {}

    score(resumeText: string, jobDescription: string): MatchResult {
        if (!resumeText || !jobDescription) {
            logger.warn('Empty text provided for match scoring');
            return emptyMatchResult();
        }

        const keywords = this.extractor.extract(jobDescription, DEFAULT_TOP_N);
        if (keywords.length === 0) {
            logger.warn('No keywords extracted from job description');
            return emptyMatchResult();
        }

        const resumeLower = resumeText.toLowerCase();
        const matched: string[] = [];
        const missing: string[] = [];

        for (const keyword of keywords) {
            if (containsWord(resumeLower, keyword.toLowerCase())) {
                matched.push(keyword);
            } else {
                missing.push(keyword);
            }
        }

        const score = Math.floor((matched.length / keywords.length) * 100);

        logger.info('Match score calculated', {
            score,
            matched: matched.length,
            total: keywords.length
        });

        return {
            score,
            matchedKeywords: matched,
            missingKeywords: missing,
            totalKeywords: keywords.length,
            matchedCount: matched.length,
            missingCount: missing.length
        };
    }
}
