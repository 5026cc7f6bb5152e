import { describe, expect, it } from 'vitest';
import { IssueSeverity } from '../models/AtsIssue';
import { emptySections } from '../models/ParsedDocument';
import {
    ATSChecker,
    ATS_PASS_THRESHOLD,
    SECTION_RULES,
    calculateAtsScore,
    checkFormatting
} from '../services/atsChecker';
import { RESUME_TEXT, documentFromText } from './helpers';

const { HIGH, MEDIUM, LOW } = IssueSeverity;

describe('calculateAtsScore', () => {
    it('starts at 100 and deducts per severity', () => {
        expect(calculateAtsScore([])).toBe(100);
        expect(calculateAtsScore([{ severity: HIGH }, { severity: HIGH }])).toBe(80);
        expect(calculateAtsScore([{ severity: HIGH }, { severity: MEDIUM }, { severity: LOW }])).toBe(83);
    });

    it('never drops below zero', () => {
        expect(calculateAtsScore(Array.from({ length: 20 }, () => ({ severity: HIGH })))).toBe(0);
    });
});

describe('checkFormatting', () => {
    it('finds nothing in plain text or empty text', () => {
        expect(checkFormatting('Python developer at Acme\nBuilt internal APIs')).toEqual([]);
        expect(checkFormatting('')).toEqual([]);
    });

    it('reports every rule that fires, in rule order', () => {
        const issues = checkFormatting('● Photo attached\nName | Title | Company\nSee page header\nDates      2020');

        expect(issues.map((issue) => [issue.issue, issue.severity])).toEqual([
            ['special_characters', MEDIUM],
            ['table_columns', LOW],
            ['images_graphics', MEDIUM],
            ['header_footer', LOW],
            ['complex_spacing', LOW]
        ]);
        expect(issues.every((issue) => issue.type === 'formatting_issue')).toBe(true);
    });

    it('flags table and column wording without pipes', () => {
        expect(checkFormatting('Two Column layout').map((issue) => issue.issue)).toEqual(['table_columns']);
    });

    it('flags pipe-delimited cells spread over consecutive lines', () => {
        expect(checkFormatting('Python |\nJava | Go').map((issue) => issue.issue)).toEqual(['table_columns']);
        expect(checkFormatting('Python | Java')).toEqual([]);
    });

    it('flags image file names', () => {
        expect(checkFormatting('portrait.PNG').map((issue) => issue.issue)).toEqual(['images_graphics']);
    });
});

describe('ATSChecker', () => {
    const checker = new ATSChecker();

    it('reports only the summary for a complete resume', () => {
        const report = checker.check(documentFromText(RESUME_TEXT));

        expect(report.atsScore).toBe(98);
        expect(report.passed).toBe(true);
        expect(report.issueCount).toBe(1);
        expect(report.issues[0]).toEqual({
            type: 'missing_section',
            severity: LOW,
            section: 'Summary',
            message: SECTION_RULES[3].message,
            recommendation: SECTION_RULES[3].recommendation
        });
        expect(report.recommendations).toEqual([SECTION_RULES[3].recommendation]);
    });

    it('reports the four section issues in fixed order when nothing is found', () => {
        const report = checker.check({ rawText: '', contact: {}, sections: emptySections() });

        expect(report.issues.map((issue) => (issue.type === 'missing_section' ? issue.section : issue.issue))).toEqual([
            'Experience',
            'Education',
            'Skills',
            'Summary'
        ]);
        expect(report.atsScore).toBe(73);
        expect(report.passed).toBe(true);
    });

    it('lists section issues before formatting issues', () => {
        const report = checker.check(documentFromText('Jane Roe\n● Skills\nPython | SQL | Go'));

        expect(report.issues.map((issue) => issue.type)).toEqual([
            'missing_section',
            'missing_section',
            'missing_section',
            'formatting_issue',
            'formatting_issue'
        ]);
        // 100 - 10 - 10 - 2 - 5 - 2
        expect(report.atsScore).toBe(71);
        expect(report.recommendations).toEqual(report.issues.map((issue) => issue.recommendation));
    });

    it('fails below the pass threshold', () => {
        const report = checker.check({
            rawText: '● photo | table | header   footer',
            contact: {},
            sections: emptySections()
        });

        expect(report.atsScore).toBe(57);
        expect(report.passed).toBe(false);
    });

    it('uses a pass threshold of 70', () => {
        expect(ATS_PASS_THRESHOLD).toBe(70);
    });

    it('deducts penalties consistently across issue mixes', () => {
        for (let high = 0; high <= 4; high++) {
            for (let medium = 0; medium <= 4; medium++) {
                for (let low = 0; low <= 4; low++) {
                    const issues = [
                        ...Array.from({ length: high }, () => ({ severity: HIGH })),
                        ...Array.from({ length: medium }, () => ({ severity: MEDIUM })),
                        ...Array.from({ length: low }, () => ({ severity: LOW }))
                    ];
                    const score = calculateAtsScore(issues);
                    expect(score).toBe(Math.max(0, 100 - 10 * high - 5 * medium - 2 * low));
                }
            }
        }
    });
});
