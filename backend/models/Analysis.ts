import type { ATSIssue, ATSReport } from './AtsIssue';
import type { ParsedDocument } from './ParsedDocument';

// Relevance-ordered, lowercase, unique
export type KeywordSet = readonly string[];

export interface MatchResult {
    score: number;
    matchedKeywords: readonly string[];
    missingKeywords: readonly string[];
    totalKeywords: number;
    matchedCount: number;
    missingCount: number;
}

export interface AnalysisContext {
    resumeText: string;
    parsedDocument: ParsedDocument;
    jobDescription: string;
}

/**
 * Combined report. Field names map onto the external JSON shape as
 * matchScore -> match_score, atsScore -> ats_score, and so on.
 */
export interface CompositeAnalysis {
    readonly matchScore: number;
    readonly atsScore: number;
    readonly semanticSimilarity: number;
    readonly matchingKeywords: readonly string[];
    readonly missingKeywords: readonly string[];
    readonly atsIssues: readonly ATSIssue[];
    readonly processingTimeMs: number;
    readonly keywordMatch: MatchResult;
    readonly atsReport: ATSReport;
}

export interface AISuggestion {
    type: string;
    priority: 'high' | 'medium' | 'low';
    issue: string;
    suggestion: string;
    example?: string;
}

export interface SuggestionRequest {
    resumeText: string;
    jobDescription: string;
    missingKeywords: readonly string[];
    atsIssues: readonly ATSIssue[];
}

export interface UploadedFile {
    buffer: Buffer;
    mimeType: string;
    originalName?: string;
}

export interface UploadAnalysis {
    fileHash: string;
    document: ParsedDocument;
    analysis: CompositeAnalysis;
    suggestions: readonly AISuggestion[] | null;
}
