import { AppConfig, config as defaultConfig } from './config/app';
import { AnalysisService, Clock } from './services/analysisService';
import { ATSChecker } from './services/atsChecker';
import { KeywordExtractor } from './services/keywordExtractor';
import { MatchScorer } from './services/matchScorer';
import { NlpModel, loadNlpModel } from './services/nlpModel';
import { ResumeParser, ResumeParserOptions } from './services/resumeParser';
import { HttpSuggestionProvider, SuggestionProvider } from './services/suggestionService';

export interface AnalysisEngine {
    model: NlpModel;
    parser: ResumeParser;
    keywordExtractor: KeywordExtractor;
    matchScorer: MatchScorer;
    atsChecker: ATSChecker;
    analysisService: AnalysisService;
}

export interface EngineOptions {
    config?: AppConfig;
    // Shared read-only model; loaded from config when omitted
    model?: NlpModel;
    extractors?: ResumeParserOptions;
    suggestionProvider?: SuggestionProvider;
    clock?: Clock;
}

/**
 * Wires the analysis services around one model instance.
 * @throws ConfigurationError when the configured NLP model cannot be loaded
 */
export function createAnalysisEngine(options: EngineOptions = {}): AnalysisEngine {
    const config = options.config ?? defaultConfig;
    const model = options.model ?? loadNlpModel(config.nlp.model);

    const parser = new ResumeParser(options.extractors);
    const keywordExtractor = new KeywordExtractor(model);
    const matchScorer = new MatchScorer(keywordExtractor);
    const atsChecker = new ATSChecker();

    const suggestionProvider =
        options.suggestionProvider ??
        (config.ai.serviceUrl ? new HttpSuggestionProvider(config.ai.serviceUrl) : undefined);

    const analysisService = new AnalysisService({
        parser,
        matchScorer,
        atsChecker,
        suggestionProvider,
        enableSuggestions: config.ai.enableSuggestions,
        clock: options.clock
    });

    return { model, parser, keywordExtractor, matchScorer, atsChecker, analysisService };
}
