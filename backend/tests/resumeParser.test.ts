import PizZip from 'pizzip';
import { describe, expect, it, vi } from 'vitest';
import { extractDocxText } from '../services/extractors/docxExtractor';
import { layoutLines, pdfLayoutExtractor, pdfParseExtractor } from '../services/extractors/pdfExtractor';
import { ResumeParser, extractContactInfo, identifySections } from '../services/resumeParser';
import { ErrorCodes, ExtractionError } from '../utils/errors';
import { RESUME_TEXT, buildPdf, failingExtractor, textExtractor } from './helpers';

const LONG_TEXT = `${RESUME_TEXT}\n${'Delivered reporting pipelines for finance teams. '.repeat(3)}`.trim();

function docxBuffer(bodyXml: string): Buffer {
    const zip = new PizZip();
    zip.file(
        'word/document.xml',
        '<?xml version="1.0" encoding="UTF-8"?>' +
            '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
            `<w:body>${bodyXml}</w:body></w:document>`
    );
    return zip.generate({ type: 'nodebuffer' });
}

const paragraph = (...runs: string[]) => `<w:p>${runs.map((run) => `<w:r>${run}</w:r>`).join('')}</w:p>`;

describe('extractContactInfo', () => {
    it('recovers each contact token exactly', () => {
        const contact = extractContactInfo(
            'Jane Roe\njane.roe@example.com | (555) 123-4567\nlinkedin.com/in/jane-roe'
        );

        expect(contact).toEqual({
            email: 'jane.roe@example.com',
            phone: '(555) 123-4567',
            linkedin: 'linkedin.com/in/jane-roe'
        });
    });

    it('keeps the first match of each field', () => {
        const contact = extractContactInfo('a.one@example.com b.two@example.com +1 555.123.4567 555-987-6543');

        expect(contact.email).toBe('a.one@example.com');
        expect(contact.phone).toBe('+1 555.123.4567');
    });

    it('matches LinkedIn URLs in any case', () => {
        expect(extractContactInfo('https://www.LinkedIn.com/in/jroe').linkedin).toBe('LinkedIn.com/in/jroe');
    });

    it('leaves missing fields out', () => {
        expect(extractContactInfo('No contact details here')).toEqual({});
    });
});

describe('identifySections', () => {
    it('collects blocks under each heading and keeps repeats separate', () => {
        const sections = identifySections(
            [
                'Jane Roe',
                'Work Experience',
                'Engineer at Acme',
                'Built APIs',
                '',
                'EDUCATION',
                'BSc Computer Science',
                'Technical Skills',
                '  Python, SQL  ',
                'Professional Experience',
                'Intern at Beta'
            ].join('\n')
        );

        expect(sections).toEqual({
            experience: ['Engineer at Acme\nBuilt APIs', 'Intern at Beta'],
            education: ['BSc Computer Science'],
            skills: ['Python, SQL']
        });
    });

    it('returns empty sections when no heading is found', () => {
        expect(identifySections('Jane Roe\nPython developer')).toEqual({ experience: [], education: [], skills: [] });
    });

    it('skips a heading with nothing under it', () => {
        expect(identifySections('Skills\nEducation\nBSc').skills).toEqual([]);
    });
});

describe('layoutLines', () => {
    it('orders rows top to bottom and items left to right', () => {
        const lines = layoutLines([
            { str: 'World', x: 50, y: 700 },
            { str: 'Next', x: 10, y: 680 },
            { str: 'Hello', x: 10, y: 700.5 },
            { str: ' ', x: 0, y: 690 }
        ]);

        expect(lines).toEqual(['Hello World', 'Next']);
    });
});

describe('extractDocxText', () => {
    it('reads paragraphs, then table rows', () => {
        const buffer = docxBuffer(
            paragraph('<w:t>Experience</w:t>') +
                paragraph('<w:t>Engineer</w:t><w:tab/><w:t>2020</w:t>') +
                '<w:tbl><w:tr>' +
                `<w:tc>${paragraph('<w:t>Python</w:t>')}</w:tc>` +
                `<w:tc>${paragraph('<w:t>SQL</w:t>')}</w:tc>` +
                '</w:tr></w:tbl>'
        );

        expect(extractDocxText(buffer)).toBe('Experience\nEngineer\t2020\nPython SQL');
    });
});

describe('ResumeParser', () => {
    it('uses the primary PDF text when it is long enough', async () => {
        const fallback = { name: 'fallback', extract: vi.fn(async () => 'unused') };
        const parser = new ResumeParser({ pdfPrimary: textExtractor('primary', LONG_TEXT), pdfFallback: fallback });

        const document = await parser.parse(Buffer.from('pdf'), 'pdf');

        expect(document.rawText).toBe(LONG_TEXT);
        expect(document.contact.email).toBe('jane.roe@example.com');
        expect(document.sections.skills).toEqual([
            `Python\n${'Delivered reporting pipelines for finance teams. '.repeat(3).trim()}`
        ]);
        expect(fallback.extract).not.toHaveBeenCalled();
    });

    it('falls back when the primary text is under 100 characters', async () => {
        const parser = new ResumeParser({
            pdfPrimary: textExtractor('primary', '  short  '),
            pdfFallback: textExtractor('fallback', LONG_TEXT)
        });

        expect((await parser.parse(Buffer.from('pdf'), 'pdf')).rawText).toBe(LONG_TEXT);
    });

    it('reports a failing primary method without trying the fallback', async () => {
        const fallback = { name: 'fallback', extract: vi.fn(async () => LONG_TEXT) };
        const parser = new ResumeParser({ pdfPrimary: failingExtractor('primary', 'bad xref'), pdfFallback: fallback });

        await expect(parser.parse(Buffer.from('pdf'), 'pdf')).rejects.toThrow('Error extracting PDF: bad xref');
        expect(fallback.extract).not.toHaveBeenCalled();
    });

    it('parses DOCX through the DOCX extractor', async () => {
        const parser = new ResumeParser({ docx: textExtractor('docx', RESUME_TEXT) });

        const document = await parser.parse(Buffer.from('docx'), 'docx');

        expect(document.sections.experience).toEqual(['Python developer at Acme']);
        expect(Object.isFrozen(document)).toBe(true);
        expect(Object.isFrozen(document.sections.experience)).toBe(true);
    });

    it('rejects corrupt DOCX bytes', async () => {
        const error = await new ResumeParser().parse(Buffer.from('not a zip archive'), 'docx').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ExtractionError);
    });

    it('rejects unsupported types', async () => {
        const error = await new ResumeParser().parse(Buffer.from('text'), 'txt').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toMatchObject({ code: ErrorCodes.UNSUPPORTED_FILE_TYPE, statusCode: 400 });
    });
});

describe('PDF extraction', () => {
    const pdf = buildPdf(['Skills', 'Python']);

    it('reads the text stream with pdf-parse', async () => {
        const text = await pdfParseExtractor.extract(pdf);

        expect(text.trim()).toBe('Skills\nPython');
    }, 20000);

    it('rebuilds lines from pdf.js text items', async () => {
        expect(await pdfLayoutExtractor.extract(pdf)).toBe('Skills\nPython');
    }, 20000);

    it('falls back to the layout method for a short document', async () => {
        const fallback = vi.fn((buffer: Buffer) => pdfLayoutExtractor.extract(buffer));
        const parser = new ResumeParser({ pdfFallback: { name: 'pdfjs-layout', extract: fallback } });

        const document = await parser.parse(pdf, 'pdf');

        expect(fallback).toHaveBeenCalledTimes(1);
        expect(document.rawText).toBe('Skills\nPython');
        expect(document.sections).toEqual({ experience: [], education: [], skills: ['Python'] });
    }, 20000);
});
