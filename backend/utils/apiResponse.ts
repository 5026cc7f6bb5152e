import type { CompositeAnalysis, UploadAnalysis } from '../models/Analysis';
import type { ATSIssue } from '../models/AtsIssue';

export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta?: {
        version: string;
        timestamp: number;
    };
}

export function createSuccessResponse<T>(data: T, meta?: Partial<ApiResponse<T>['meta']>): ApiResponse<T> {
    return {
        success: true,
        data,
        meta: {
            version: '1.0',
            timestamp: Date.now(),
            ...meta
        }
    };
}

export function createErrorResponse(code: string, message: string, details?: unknown): ApiResponse<never> {
    return {
        success: false,
        error: {
            code,
            message,
            details
        },
        meta: {
            version: '1.0',
            timestamp: Date.now()
        }
    };
}

export interface AtsIssueBody {
    type: string;
    severity: string;
    message: string;
    recommendation: string;
    section?: string;
    issue?: string;
}

export interface AnalysisBody {
    match_score: number;
    ats_score: number;
    semantic_similarity: number;
    matching_keywords: string[];
    missing_keywords: string[];
    ats_issues: AtsIssueBody[];
    processing_time_ms: number;
}

function toIssueBody(issue: ATSIssue): AtsIssueBody {
    const base = {
        type: issue.type,
        severity: issue.severity,
        message: issue.message,
        recommendation: issue.recommendation
    };
    return issue.type === 'missing_section' ? { ...base, section: issue.section } : { ...base, issue: issue.issue };
}

/**
 * External (snake_case) shape of a composite analysis.
 */
export function toAnalysisBody(analysis: CompositeAnalysis): AnalysisBody {
    return {
        match_score: analysis.matchScore,
        ats_score: analysis.atsScore,
        semantic_similarity: analysis.semanticSimilarity,
        matching_keywords: [...analysis.matchingKeywords],
        missing_keywords: [...analysis.missingKeywords],
        ats_issues: analysis.atsIssues.map(toIssueBody),
        processing_time_ms: analysis.processingTimeMs
    };
}

export function toUploadAnalysisBody(result: UploadAnalysis) {
    return {
        file_hash: result.fileHash,
        contact: result.document.contact,
        sections: result.document.sections,
        analysis: toAnalysisBody(result.analysis),
        suggestions: result.suggestions
    };
}
