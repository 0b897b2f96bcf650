/**
 * PDF text extraction (pdf-parse v1)
 *
 * pdf-parse's package entry runs a self-test when it is loaded without a
 * parent module, which is always the case under ESM. The library file is
 * required directly instead.
 *
 * Page text is collected through the `pagerender` hook, which pdf-parse
 * calls once per page in page order.
 *
 * @module services/documents/pdf
 */

import { createRequire } from 'module';
import type pdfParseEntry from 'pdf-parse';

type PdfResult = Awaited<ReturnType<typeof pdfParseEntry>>;

/** A text run as pdf.js reports it; `transform[5]` is the baseline y */
export interface PdfTextItem {
  str: string;
  transform: number[];
}

/** The part of pdf.js's page proxy that pagerender uses */
export interface PdfPage {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

type PdfParse = (
  buffer: Buffer,
  options?: { pagerender?: (page: PdfPage) => Promise<string> }
) => Promise<PdfResult>;

const require = createRequire(import.meta.url);
const pdfParse: PdfParse = require('pdf-parse/lib/pdf-parse.js');

export interface PdfText {
  text: string;
  pageCount: number;
  /** Rendered text of each page; used for per-page artifact checks */
  pages: string[];
}

export const PDF_SIGNATURE = '%PDF';

export function looksLikePdf(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, PDF_SIGNATURE.length)).toString('latin1') === PDF_SIGNATURE;
}

/**
 * Join a page's text runs, starting a new line whenever the baseline moves.
 * Same layout as pdf-parse's default renderer.
 */
export function renderPageText(items: readonly PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/**
 * A pagerender hook plus the page texts it has rendered so far.
 */
export function createPageCollector(): {
  pages: string[];
  pagerender: (page: PdfPage) => Promise<string>;
} {
  const pages: string[] = [];
  return {
    pages,
    pagerender: async (page) => {
      const content = await page.getTextContent({
        normalizeWhitespace: false,
        disableCombineTextItems: false,
      });
      const text = renderPageText(content.items);
      pages.push(text);
      return text;
    },
  };
}

export async function extractPdfText(buffer: Buffer): Promise<PdfText> {
  const collector = createPageCollector();
  const data = await pdfParse(buffer, { pagerender: collector.pagerender });
  return {
    text: data.text,
    pageCount: data.numpages,
    pages: collector.pages,
  };
}
