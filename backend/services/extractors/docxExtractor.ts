import PizZip from 'pizzip';
import { DOMParser } from '@xmldom/xmldom';
import type { TextExtractor } from './pdfExtractor';

const ELEMENT_NODE = 1;

function isElement(node: Node): node is Element {
    return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Node, tagName: string): Element[] {
    const result: Element[] = [];
    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (isElement(child) && child.nodeName === tagName) {
            result.push(child);
        }
    }
    return result;
}

/**
 * Text of a run container: w:t content, with tabs and breaks kept.
 */
function runText(node: Node): string {
    let text = '';
    for (let i = 0; i < node.childNodes.length; i++) {
        const child = node.childNodes[i];
        if (!isElement(child)) {
            continue;
        }
        switch (child.nodeName) {
            case 'w:t':
                text += child.textContent || '';
                break;
            case 'w:tab':
                text += '\t';
                break;
            case 'w:br':
            case 'w:cr':
                text += '\n';
                break;
            default:
                text += runText(child);
        }
    }
    return text;
}

function cellText(cell: Element): string {
    return childElements(cell, 'w:p').map(runText).join('\n');
}

const getDocXml = (zip: PizZip): string => {
    const file = zip.file('word/document.xml');
    if (!file) throw new Error('Invalid DOCX: missing word/document.xml');
    return file.asText();
};

/**
 * Body paragraphs one per line, then each table row as its cell texts each
 * followed by a space.
 */
export function extractDocxText(buffer: Buffer): string {
    const zip = new PizZip(buffer);
    const doc = new DOMParser().parseFromString(getDocXml(zip), 'text/xml');
    const body = doc.getElementsByTagName('w:body')[0];
    if (!body) throw new Error('Invalid DOCX: missing document body');

    let text = '';

    for (const paragraph of childElements(body, 'w:p')) {
        text += runText(paragraph) + '\n';
    }

    for (const table of childElements(body, 'w:tbl')) {
        for (const row of childElements(table, 'w:tr')) {
            for (const cell of childElements(row, 'w:tc')) {
                text += cellText(cell) + ' ';
            }
            text += '\n';
        }
    }

    return text.trim();
}

export const docxExtractor: TextExtractor = {
    name: 'docx',
    async extract(buffer: Buffer): Promise<string> {
        return extractDocxText(buffer);
    }
};
