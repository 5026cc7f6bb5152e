import type { Entity, NlpModel } from '../services/nlpModel';
import type { TextExtractor } from '../services/extractors/pdfExtractor';
import type { ParsedDocument } from '../models/ParsedDocument';
import { extractContactInfo, identifySections } from '../services/resumeParser';

export class StubNlpModel implements NlpModel {
    readonly name = 'stub';
    calls = 0;

    constructor(private readonly result: Entity[] = []) {}

    entities(): Entity[] {
        this.calls++;
        return this.result.map((entity) => ({ ...entity }));
    }
}

export class ThrowingNlpModel implements NlpModel {
    readonly name = 'broken';

    entities(): Entity[] {
        throw new Error('model crashed');
    }
}

export function textExtractor(name: string, text: string): TextExtractor {
    return {
        name,
        extract: async () => text
    };
}

export function failingExtractor(name: string, message: string): TextExtractor {
    return {
        name,
        extract: async () => {
            throw new Error(message);
        }
    };
}

export function documentFromText(rawText: string): ParsedDocument {
    return {
        rawText,
        contact: extractContactInfo(rawText),
        sections: identifySections(rawText)
    };
}

export const RESUME_TEXT = [
    'Jane Roe',
    'jane.roe@example.com',
    'Experience',
    'Python developer at Acme',
    'Education',
    'BSc Computer Science',
    'Skills',
    'Python'
].join('\n');

export const JOB_DESCRIPTION = 'Python developer. Python engineer.';

/**
 * Minimal one-page PDF with each line drawn in Helvetica, 20pt apart.
 */
export function buildPdf(lines: string[]): Buffer {
    const escape = (text: string) => text.replace(/[\\()]/g, (char) => `\\${char}`);
    const content = `BT /F1 12 Tf 72 720 Td ${lines.map((line) => `(${escape(line)}) Tj`).join(' 0 -20 Td ')} ET`;

    const objects = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
        '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
        `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>'
    ];

    let pdf = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((body, index) => {
        offsets.push(pdf.length);
        pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
    });

    const xrefOffset = pdf.length;
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

    return Buffer.from(pdf, 'latin1');
}
