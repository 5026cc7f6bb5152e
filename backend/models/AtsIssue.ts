export enum IssueSeverity {
    HIGH = 'high',
    MEDIUM = 'medium',
    LOW = 'low'
}

export type FormattingIssueKind =
    | 'special_characters'
    | 'table_columns'
    | 'images_graphics'
    | 'header_footer'
    | 'complex_spacing';

interface IssueBase {
    severity: IssueSeverity;
    message: string;
    recommendation: string;
}

export interface SectionIssue extends IssueBase {
    type: 'missing_section';
    section: string;
}

export interface FormattingIssue extends IssueBase {
    type: 'formatting_issue';
    issue: FormattingIssueKind;
}

export type ATSIssue = SectionIssue | FormattingIssue;

export interface ATSReport {
    atsScore: number;
    issues: readonly ATSIssue[];
    issueCount: number;
    recommendations: readonly string[];
    passed: boolean;
}
