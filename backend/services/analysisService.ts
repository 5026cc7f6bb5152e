import { config } from '../config/app';
import type {
    AISuggestion,
    AnalysisContext,
    CompositeAnalysis,
    MatchResult,
    UploadAnalysis,
    UploadedFile
} from '../models/Analysis';
import type { ATSReport } from '../models/AtsIssue';
import { ApplicationError, ErrorCodes, ExtractionError, errorMessage } from '../utils/errors';
import { calculateFileHash, declaredTypeFromMimeType, validateFileSize } from '../utils/fileHandler';
import { logger } from '../utils/logger';
import { ValidationSchema, assertValid } from '../utils/validateInput';
import { ATSChecker } from './atsChecker';
import { MatchScorer } from './matchScorer';
import { ResumeParser } from './resumeParser';
import type { SuggestionProvider } from './suggestionService';

export const KEYWORD_WEIGHT = 0.6;
export const ATS_WEIGHT = 0.4;

export type Clock = () => number;

export interface AnalysisServiceOptions {
    parser: ResumeParser;
    matchScorer: MatchScorer;
    atsChecker: ATSChecker;
    suggestionProvider?: SuggestionProvider;
    enableSuggestions?: boolean;
    clock?: Clock;
}

const uploadSchema: ValidationSchema = {
    buffer: {
        type: 'buffer',
        required: true,
        custom: (value) => ({
            valid: Buffer.isBuffer(value) && value.length > 0,
            message: 'buffer must not be empty'
        })
    },
    // type/subtype; whether the type is supported is checked after validation
    mimeType: { type: 'string', required: true, pattern: /^[\w.+-]+\/[\w.+-]+$/ },
    jobDescription: { type: 'string', required: true, min: 1 }
};

/**
 * Weighted keyword and ATS score, rounded to two decimals.
 */
export function combineScores(matchScore: number, atsScore: number): number {
    return Math.round((matchScore * KEYWORD_WEIGHT + atsScore * ATS_WEIGHT) * 100) / 100;
}

export class AnalysisService {
    private readonly parser: ResumeParser;
    private readonly matchScorer: MatchScorer;
    private readonly atsChecker: ATSChecker;
    private readonly suggestionProvider?: SuggestionProvider;
    private readonly enableSuggestions: boolean;
    private readonly clock: Clock;

    constructor(options: AnalysisServiceOptions) {
        this.parser = options.parser;
        this.matchScorer = options.matchScorer;
        this.atsChecker = options.atsChecker;
        this.suggestionProvider = options.suggestionProvider;
        this.enableSuggestions = options.enableSuggestions ?? config.ai.enableSuggestions;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * Scores keywords and ATS compatibility side by side and merges them.
     */
    async analyze(context: AnalysisContext): Promise<CompositeAnalysis> {
        const startedAt = this.clock();

        const [keywordMatch, atsReport] = await Promise.all([
            this.runMatch(context.resumeText, context.jobDescription),
            this.runAtsCheck(context)
        ]);

        const analysis: CompositeAnalysis = {
            matchScore: combineScores(keywordMatch.score, atsReport.atsScore),
            atsScore: atsReport.atsScore,
            semanticSimilarity: keywordMatch.score,
            matchingKeywords: keywordMatch.matchedKeywords,
            missingKeywords: keywordMatch.missingKeywords,
            atsIssues: atsReport.issues,
            processingTimeMs: Math.max(0, Math.round(this.clock() - startedAt)),
            keywordMatch: Object.freeze(keywordMatch),
            atsReport
        };

        logger.info('Analysis complete', {
            matchScore: analysis.matchScore,
            keywordScore: keywordMatch.score,
            atsScore: atsReport.atsScore,
            processingTimeMs: analysis.processingTimeMs
        });

        return Object.freeze(analysis);
    }

    /**
     * Validates, parses and analyzes an uploaded resume, then asks the
     * suggestion provider (when enabled) for improvements.
     */
    async analyzeUpload(file: UploadedFile, jobDescription: string): Promise<UploadAnalysis> {
        assertValid(
            { buffer: file.buffer, mimeType: file.mimeType, jobDescription },
            uploadSchema,
            'analysis'
        );

        if (!validateFileSize(file.buffer.length)) {
            throw new ApplicationError(
                ErrorCodes.FILE_TOO_LARGE,
                `File exceeds the ${config.upload.maxFileSize / (1024 * 1024)}MB limit`,
                413,
                { size: file.buffer.length, maxFileSize: config.upload.maxFileSize }
            );
        }

        const declaredType = declaredTypeFromMimeType(file.mimeType);
        if (!declaredType) {
            throw new ExtractionError(
                `Unsupported file type: ${file.mimeType}`,
                ErrorCodes.UNSUPPORTED_FILE_TYPE
            );
        }

        const fileHash = calculateFileHash(file.buffer);
        logger.info('Analyzing upload', { fileName: file.originalName, type: declaredType, fileHash });

        const document = await this.parser.parse(file.buffer, declaredType);
        const analysis = await this.analyze({
            resumeText: document.rawText,
            parsedDocument: document,
            jobDescription
        });
        const suggestions = await this.suggest(document.rawText, jobDescription, analysis);

        return { fileHash, document, analysis, suggestions };
    }

    private async runMatch(resumeText: string, jobDescription: string): Promise<MatchResult> {
        return this.matchScorer.score(resumeText, jobDescription);
    }

    private async runAtsCheck(context: AnalysisContext): Promise<ATSReport> {
        return this.atsChecker.check(context.parsedDocument);
    }

    private async suggest(
        resumeText: string,
        jobDescription: string,
        analysis: CompositeAnalysis
    ): Promise<readonly AISuggestion[] | null> {
        if (!this.enableSuggestions || !this.suggestionProvider) {
            return null;
        }

        try {
            const suggestions = await this.suggestionProvider.suggest({
                resumeText,
                jobDescription,
                missingKeywords: analysis.missingKeywords,
                atsIssues: analysis.atsIssues
            });
            return Object.freeze(suggestions);
        } catch (error) {
            logger.warn('Suggestion generation failed, continuing without suggestions', {
                error: errorMessage(error)
            });
            return null;
        }
    }
}
