import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import type pdfParse from 'pdf-parse';
import { getLogger } from '../utils/logger.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';

const logger = getLogger();

/**
 * PDF bytes in memory, or a path to read them from.
 */
export type DocumentInput = Buffer | { path: string };

/**
 * Turns a downloaded document into markdown text.
 */
export interface DocumentConverter {
    toMarkdown(input: DocumentInput, options: { filename: string }): Promise<string>;
}

/**
 * Text extraction step, shaped like pdf-parse's default export.
 */
export type PdfTextExtractor = (data: Buffer) => Promise<{ text: string; numpages: number; info?: unknown }>;

/**
 * pdf-parse loaded through require: its ESM entry runs a debug branch
 * that reads a bundled test file when it has no parent module.
 */
function loadPdfParse(): PdfTextExtractor {
    const require = createRequire(import.meta.url);
    const parse: typeof pdfParse = require('pdf-parse');
    return parse;
}

/**
 * DocumentConverter backed by pdf-parse. Conversion is text-only: page
 * text becomes paragraphs, and the PDF's Title (when set) a heading.
 */
export class PdfParseConverter implements DocumentConverter {
    private parse: PdfTextExtractor | undefined;

    constructor(options?: { parse?: PdfTextExtractor }) {
        this.parse = options?.parse;
    }

    async toMarkdown(input: DocumentInput, options: { filename: string }): Promise<string> {
        const data = Buffer.isBuffer(input) ? input : await readFile(input.path);
        const parse = (this.parse ??= loadPdfParse());

        let result: Awaited<ReturnType<PdfTextExtractor>>;
        try {
            result = await parse(data);
        } catch (error) {
            throw new ExtractionError(`Failed to extract text from ${options.filename}: ${errorMessage(error)}`, error);
        }

        const body = toParagraphs(result.text);
        if (!body) {
            throw new ExtractionError(`No text could be extracted from ${options.filename}`);
        }

        logger.debug({ filename: options.filename, pages: result.numpages, bytes: data.length }, 'PDF converted');

        const title = pdfTitle(result.info);
        return title ? `# ${title}\n\n${body}\n` : `${body}\n`;
    }
}

/**
 * Trim each line and collapse runs of blank lines into one paragraph break.
 */
export function toParagraphs(text: string): string {
    return text
        .split(/\r?\n/)
        .map((line) => line.replace(/[ \t]+/g, ' ').trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

function pdfTitle(info: unknown): string {
    if (!info || typeof info !== 'object' || !('Title' in info)) return '';
    return typeof info.Title === 'string' ? info.Title.trim() : '';
}
