import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { PdfParseConverter, toParagraphs, type PdfTextExtractor } from '../documents/pdf-converter.js';
import { ExtractionError } from '../utils/errors.js';

function extractor(text: string, info?: unknown): PdfTextExtractor {
    return vi.fn(async () => ({ text, numpages: 1, info }));
}

describe('PdfParseConverter', () => {
    it('should turn extracted text into paragraphs under the PDF title', async () => {
        const converter = new PdfParseConverter({ parse: extractor('Hello\n\n\nWorld', { Title: ' My Paper ' }) });

        await expect(converter.toMarkdown(Buffer.from('%PDF-1.4'), { filename: 'a.pdf' }))
            .resolves.toBe('# My Paper\n\nHello\n\nWorld\n');
    });

    it('should omit the heading when the PDF has no title', async () => {
        const converter = new PdfParseConverter({ parse: extractor('Hello\n\n\nWorld', {}) });

        await expect(converter.toMarkdown(Buffer.from('%PDF-1.4'), { filename: 'a.pdf' }))
            .resolves.toBe('Hello\n\nWorld\n');
    });

    it('should read a file path', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'converter-'));
        const path = join(dir, 'paper.pdf');
        await writeFile(path, '%PDF-1.4 test');

        try {
            const parse = vi.fn(async (_data: Buffer) => ({ text: 'Body', numpages: 1 }));
            const converter = new PdfParseConverter({ parse });

            await expect(converter.toMarkdown({ path }, { filename: 'paper.pdf' })).resolves.toBe('Body\n');
            expect(parse.mock.calls[0]?.[0].toString()).toBe('%PDF-1.4 test');
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('should reject output without text', async () => {
        const converter = new PdfParseConverter({ parse: extractor('  \n \n') });
        const conversion = converter.toMarkdown(Buffer.from('%PDF-1.4'), { filename: 'empty.pdf' });

        await expect(conversion).rejects.toThrow(ExtractionError);
        await expect(conversion).rejects.toThrow('No text could be extracted from empty.pdf');
    });

    it('should wrap parser failures', async () => {
        const converter = new PdfParseConverter({
            parse: vi.fn(async () => {
                throw new Error('bad xref');
            }),
        });

        await expect(converter.toMarkdown(Buffer.from('x'), { filename: 'broken.pdf' }))
            .rejects.toThrow('Failed to extract text from broken.pdf: bad xref');
    });
});

describe('toParagraphs', () => {
    it('should trim lines and collapse blank runs', () => {
        expect(toParagraphs('  Line one  \n\n\n\nLine   two\r\n')).toBe('Line one\n\nLine two');
    });
});
