export interface TextExtractor {
    readonly name: string;
    extract(buffer: Buffer): Promise<string>;
}

/**
 * Primary PDF method: pdf-parse's plain text stream.
 */
export const pdfParseExtractor: TextExtractor = {
    name: 'pdf-parse',
    async extract(buffer: Buffer): Promise<string> {
        // Lazy-load, and use the library file directly to skip the package's debug entry
        const { default: pdfParse } = await import('pdf-parse/lib/pdf-parse.js');
        const result = await pdfParse(buffer);
        return result.text || '';
    }
};

interface PositionedText {
    str: string;
    x: number;
    y: number;
}

// Items whose baselines differ by less than this share a line
const LINE_TOLERANCE = 2;

/**
 * Rebuilds reading order from positioned text items: rows top to bottom,
 * items left to right within a row.
 */
export function layoutLines(items: PositionedText[]): string[] {
    const rows: { y: number; items: PositionedText[] }[] = [];

    for (const item of items) {
        if (!item.str.trim()) {
            continue;
        }
        const row = rows.find((r) => Math.abs(r.y - item.y) < LINE_TOLERANCE);
        if (row) {
            row.items.push(item);
        } else {
            rows.push({ y: item.y, items: [item] });
        }
    }

    // PDF y grows upwards
    rows.sort((a, b) => b.y - a.y);

    return rows.map((row) =>
        row.items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str.trim())
            .join(' ')
    );
}

/**
 * Secondary PDF method: layout-aware extraction over pdf.js text items, for
 * documents whose text stream comes out empty or scrambled.
 */
export const pdfLayoutExtractor: TextExtractor = {
    name: 'pdfjs-layout',
    async extract(buffer: Buffer): Promise<string> {
        const pdfjs = await import('pdfjs-dist');
        const loadingTask = pdfjs.getDocument({ data: new Uint8Array(buffer) });
        const pdf = await loadingTask.promise;

        try {
            const pages: string[] = [];

            for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
                const page = await pdf.getPage(pageNumber);
                const content = await page.getTextContent();
                const items: PositionedText[] = [];

                for (const item of content.items) {
                    if ('str' in item) {
                        items.push({
                            str: item.str,
                            x: Number(item.transform[4]),
                            y: Number(item.transform[5])
                        });
                    }
                }

                pages.push(layoutLines(items).join('\n'));
                page.cleanup();
            }

            return pages.join('\n');
        } finally {
            await pdf.destroy();
        }
    }
};
