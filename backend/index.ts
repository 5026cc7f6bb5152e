export { createAnalysisEngine } from './engine';
export type { AnalysisEngine, EngineOptions } from './engine';
export { createApp } from './app';

export { ResumeParser, extractContactInfo, identifySections } from './services/resumeParser';
export { KeywordExtractor } from './services/keywordExtractor';
export { MatchScorer } from './services/matchScorer';
export { ATSChecker, ATS_PASS_THRESHOLD, calculateAtsScore } from './services/atsChecker';
export { AnalysisService, ATS_WEIGHT, KEYWORD_WEIGHT, combineScores } from './services/analysisService';
export { CompromiseNlpModel, loadNlpModel } from './services/nlpModel';
export type { Entity, EntityLabel, NlpModel } from './services/nlpModel';
export { HttpSuggestionProvider } from './services/suggestionService';
export type { SuggestionProvider } from './services/suggestionService';

export { ApplicationError, ConfigurationError, ErrorCodes, ExtractionError } from './utils/errors';
export { toAnalysisBody } from './utils/apiResponse';

export * from './models/Analysis';
export * from './models/AtsIssue';
export * from './models/ParsedDocument';
