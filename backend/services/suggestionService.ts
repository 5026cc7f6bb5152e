import axios from 'axios';
import { config } from '../config/app';
import type { AISuggestion, SuggestionRequest } from '../models/Analysis';
import { logger } from '../utils/logger';

/**
 * Optional post-processor run after scoring. Failures never affect scores.
 */
export interface SuggestionProvider {
    suggest(request: SuggestionRequest): Promise<AISuggestion[]>;
}

// The part of an HTTP client the provider uses; an axios instance fits
export interface SuggestionHttpClient {
    post(url: string, data: unknown): Promise<{ data: unknown }>;
}

const PRIORITIES: ReadonlyArray<AISuggestion['priority']> = ['high', 'medium', 'low'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function toSuggestion(value: unknown): AISuggestion | null {
    if (!isRecord(value)) {
        return null;
    }
    const { type, priority, issue, suggestion, example } = value;
    if (typeof type !== 'string' || typeof issue !== 'string' || typeof suggestion !== 'string') {
        return null;
    }
    const level = PRIORITIES.find((candidate) => candidate === priority) ?? 'medium';
    return {
        type,
        priority: level,
        issue,
        suggestion,
        ...(typeof example === 'string' ? { example } : {})
    };
}

/**
 * Reads `{ suggestions: [...] }`, dropping malformed entries.
 */
export function parseSuggestions(body: unknown): AISuggestion[] {
    if (!isRecord(body) || !Array.isArray(body.suggestions)) {
        throw new Error('Suggestion service returned an unexpected response');
    }
    return body.suggestions.map(toSuggestion).filter((item): item is AISuggestion => item !== null);
}

/**
 * Posts the analysis outcome to an external suggestion service.
 */
export class HttpSuggestionProvider implements SuggestionProvider {
    private readonly client: SuggestionHttpClient;

    constructor(
        private readonly endpoint: string,
        client?: SuggestionHttpClient
    ) {
        this.client = client ?? axios.create({ timeout: config.ai.timeoutMs });
    }

    async suggest(request: SuggestionRequest): Promise<AISuggestion[]> {
        const response = await this.client.post(this.endpoint, {
            resume_text: request.resumeText,
            job_description: request.jobDescription,
            missing_keywords: request.missingKeywords,
            ats_issues: request.atsIssues
        });

        const suggestions = parseSuggestions(response.data);
        logger.debug('Suggestions received', { count: suggestions.length });
        return suggestions;
    }
}
