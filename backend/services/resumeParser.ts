import {
    ContactInfo,
    DeclaredType,
    ParsedDocument,
    SectionKey,
    Sections,
    emptySections
} from '../models/ParsedDocument';
import { logger } from '../utils/logger';
import { ErrorCodes, ExtractionError, errorMessage } from '../utils/errors';
import { TextExtractor, pdfLayoutExtractor, pdfParseExtractor } from './extractors/pdfExtractor';
import { docxExtractor } from './extractors/docxExtractor';

// Below this many characters the primary PDF text is treated as a failed read
export const MIN_PDF_TEXT_LENGTH = 100;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/;
const PHONE_PATTERN = /(\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/;
const LINKEDIN_PATTERN = /linkedin\.com\/in\/[\w-]+/i;

// Checked in this order; the first section with a matching pattern wins
const SECTION_PATTERNS: ReadonlyArray<[SectionKey, RegExp[]]> = [
    ['experience', [/work\s+experience/, /professional\s+experience/, /experience/, /employment\s+history/]],
    ['education', [/education/, /academic/, /qualifications/]],
    ['skills', [/skills/, /technical\s+skills/, /core\s+competencies/]]
];

export interface ResumeParserOptions {
    pdfPrimary?: TextExtractor;
    pdfFallback?: TextExtractor;
    docx?: TextExtractor;
}

export class ResumeParser {
    private readonly pdfPrimary: TextExtractor;
    private readonly pdfFallback: TextExtractor;
    private readonly docx: TextExtractor;

    constructor(options: ResumeParserOptions = {}) {
        this.pdfPrimary = options.pdfPrimary ?? pdfParseExtractor;
        this.pdfFallback = options.pdfFallback ?? pdfLayoutExtractor;
        this.docx = options.docx ?? docxExtractor;
    }

    /**
     * Extracts raw text, contact fields and sections from an uploaded document.
     * @throws ExtractionError when the type is unsupported or the bytes cannot be read
     */
    async parse(buffer: Buffer, declaredType: DeclaredType | string): Promise<ParsedDocument> {
        let rawText: string;

        if (declaredType === 'pdf') {
            rawText = await this.extractPdf(buffer);
        } else if (declaredType === 'docx') {
            rawText = await this.extractWith(this.docx, buffer, 'DOCX');
        } else {
            throw new ExtractionError(
                `Unsupported file type: ${declaredType}`,
                ErrorCodes.UNSUPPORTED_FILE_TYPE
            );
        }

        const document: ParsedDocument = {
            rawText,
            contact: Object.freeze(extractContactInfo(rawText)),
            sections: identifySections(rawText)
        };

        logger.info('Resume parsed', {
            type: declaredType,
            characters: rawText.length,
            sections: {
                experience: document.sections.experience.length,
                education: document.sections.education.length,
                skills: document.sections.skills.length
            }
        });

        return Object.freeze(document);
    }

    private async extractPdf(buffer: Buffer): Promise<string> {
        const primary = await this.extractWith(this.pdfPrimary, buffer, 'PDF');

        if (primary.length >= MIN_PDF_TEXT_LENGTH) {
            return primary;
        }

        logger.debug('Primary PDF text too short, using layout extraction', {
            extracted: primary.length,
            fallback: this.pdfFallback.name
        });
        return this.extractWith(this.pdfFallback, buffer, 'PDF');
    }

    private async extractWith(extractor: TextExtractor, buffer: Buffer, label: string): Promise<string> {
        try {
            const text = await extractor.extract(buffer);
            return text.trim();
        } catch (error) {
            logger.error('Text extraction failed', { extractor: extractor.name, error: errorMessage(error) });
            throw new ExtractionError(`Error extracting ${label}: ${errorMessage(error)}`);
        }
    }
}

export function extractContactInfo(text: string): ContactInfo {
    const contact: ContactInfo = {};

    const email = EMAIL_PATTERN.exec(text);
    if (email) {
        contact.email = email[0];
    }

    const phone = PHONE_PATTERN.exec(text);
    if (phone) {
        contact.phone = phone[0];
    }

    const linkedin = LINKEDIN_PATTERN.exec(text);
    if (linkedin) {
        contact.linkedin = linkedin[0];
    }

    return contact;
}

function headingSection(line: string): SectionKey | null {
    for (const [section, patterns] of SECTION_PATTERNS) {
        if (patterns.some((pattern) => pattern.test(line))) {
            return section;
        }
    }
    return null;
}

/**
 * Forward line scan. A heading closes the block collected so far; repeated
 * headings give separate entries.
 */
export function identifySections(text: string): Sections {
    const sections = emptySections();
    let current: SectionKey | null = null;
    let block: string[] = [];

    const flush = () => {
        if (current && block.length > 0) {
            sections[current].push(block.join('\n'));
        }
    };

    for (const line of text.split('\n')) {
        const heading = headingSection(line.toLowerCase().trim());

        if (heading) {
            flush();
            current = heading;
            block = [];
        } else if (current && line.trim()) {
            block.push(line.trim());
        }
    }
    flush();

    return Object.freeze({
        experience: Object.freeze(sections.experience),
        education: Object.freeze(sections.education),
        skills: Object.freeze(sections.skills)
    });
}
