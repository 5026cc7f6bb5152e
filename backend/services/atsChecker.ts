import {
    ATSIssue,
    ATSReport,
    FormattingIssue,
    FormattingIssueKind,
    IssueSeverity,
    SectionIssue
} from '../models/AtsIssue';
import type { ParsedDocument } from '../models/ParsedDocument';
import { logger } from '../utils/logger';

export const ATS_PASS_THRESHOLD = 70;

const MAX_SCORE = 100;

export const SEVERITY_PENALTY: Readonly<Record<IssueSeverity, number>> = {
    [IssueSeverity.HIGH]: 10,
    [IssueSeverity.MEDIUM]: 5,
    [IssueSeverity.LOW]: 2
};

interface SectionRule {
    section: string;
    severity: IssueSeverity;
    message: string;
    recommendation: string;
}

interface FormattingRule {
    issue: FormattingIssueKind;
    severity: IssueSeverity;
    test: RegExp | ((text: string) => boolean);
    message: string;
    recommendation: string;
}

// Evaluated in order; summary is never produced by the parser
export const SECTION_RULES: readonly SectionRule[] = [
    {
        section: 'experience',
        severity: IssueSeverity.HIGH,
        message: "Missing 'Experience' section",
        recommendation:
            'Add a detailed work experience section with job titles, companies, dates, and key achievements'
    },
    {
        section: 'education',
        severity: IssueSeverity.HIGH,
        message: "Missing 'Education' section",
        recommendation: 'Add an education section with degrees, institutions, and graduation dates'
    },
    {
        section: 'skills',
        severity: IssueSeverity.MEDIUM,
        message: "Missing 'Skills' section",
        recommendation: 'Add a skills section listing relevant technical and soft skills'
    },
    {
        section: 'summary',
        severity: IssueSeverity.LOW,
        message: "Missing 'Summary' or 'Objective' section",
        recommendation: 'Consider adding a professional summary or career objective at the top of your resume'
    }
];

const containsAny = (keywords: readonly string[]) => (text: string): boolean => {
    const lower = text.toLowerCase();
    return keywords.some((keyword) => lower.includes(keyword));
};

export const FORMATTING_RULES: readonly FormattingRule[] = [
    {
        issue: 'special_characters',
        severity: IssueSeverity.MEDIUM,
        test: /[✓✔✗✘●•○◦▪▫◾◽⬛⬜]/u,
        message: 'Special characters or bullets detected in resume',
        recommendation: "Use simple text for section headings (e.g., 'EXPERIENCE' instead of '● Experience')"
    },
    {
        issue: 'table_columns',
        severity: IssueSeverity.LOW,
        test: (text) => /\|\s*.*\s*\|/.test(text) || containsAny(['table', 'column'])(text),
        message: 'Resume may contain tables or columns',
        recommendation:
            'Avoid tables and multi-column layouts; use simple single-column format for better ATS compatibility'
    },
    {
        issue: 'images_graphics',
        severity: IssueSeverity.MEDIUM,
        test: containsAny(['image', 'photo', 'picture', 'graphic', '.jpg', '.png', '.jpeg', '.gif']),
        message: 'Resume may contain images or graphics',
        recommendation: 'Remove images, photos, and graphics; ATS systems cannot parse visual content'
    },
    {
        issue: 'header_footer',
        severity: IssueSeverity.LOW,
        test: containsAny(['header', 'footer']),
        message: 'Resume may have headers or footers',
        recommendation:
            'Avoid putting important information in headers or footers; ATS may not parse them correctly'
    },
    {
        issue: 'complex_spacing',
        severity: IssueSeverity.LOW,
        test: /\s{3,}/,
        message: 'Resume may have complex spacing or formatting',
        recommendation: 'Use consistent single spaces between words; avoid excessive spacing for alignment'
    }
];

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

function sectionContent(document: ParsedDocument, section: string): readonly string[] {
    const sections: Readonly<Record<string, readonly string[] | undefined>> = document.sections;
    return sections[section] ?? [];
}

function ruleFires(rule: FormattingRule, text: string): boolean {
    return typeof rule.test === 'function' ? rule.test(text) : rule.test.test(text);
}

export function checkSections(document: ParsedDocument, rules: readonly SectionRule[] = SECTION_RULES): SectionIssue[] {
    return rules
        .filter((rule) => sectionContent(document, rule.section).length === 0)
        .map((rule): SectionIssue => ({
            type: 'missing_section',
            severity: rule.severity,
            section: capitalize(rule.section),
            message: rule.message,
            recommendation: rule.recommendation
        }));
}

export function checkFormatting(text: string, rules: readonly FormattingRule[] = FORMATTING_RULES): FormattingIssue[] {
    if (!text) {
        return [];
    }

    return rules
        .filter((rule) => ruleFires(rule, text))
        .map((rule): FormattingIssue => ({
            type: 'formatting_issue',
            severity: rule.severity,
            issue: rule.issue,
            message: rule.message,
            recommendation: rule.recommendation
        }));
}

/**
 * 100 less the severity penalty of every issue, clamped to [0, 100].
 */
export function calculateAtsScore(issues: ReadonlyArray<Pick<ATSIssue, 'severity'>>): number {
    const penalty = issues.reduce((total, issue) => total + SEVERITY_PENALTY[issue.severity], 0);
    return Math.min(MAX_SCORE, Math.max(0, MAX_SCORE - penalty));
}

export class ATSChecker {
    check(document: ParsedDocument): ATSReport {
        const issues: ATSIssue[] = [...checkSections(document), ...checkFormatting(document.rawText)];
        const atsScore = calculateAtsScore(issues);
        const passed = atsScore >= ATS_PASS_THRESHOLD;

        logger.info('ATS check complete', { atsScore, issues: issues.length, passed });

        return Object.freeze({
            atsScore,
            issues: Object.freeze(issues),
            issueCount: issues.length,
            recommendations: Object.freeze(issues.map((issue) => issue.recommendation)),
            passed
        });
    }
}
