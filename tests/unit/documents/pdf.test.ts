/**
 * Unit tests for per-page PDF text rendering
 *
 * @module tests/unit/documents/pdf
 */

import { describe, it, expect, vi } from 'vitest';

import { hasEncodingArtifacts } from '../../../src/services/documents/index.js';
import {
  createPageCollector,
  renderPageText,
  type PdfPage,
  type PdfTextItem,
} from '../../../src/services/documents/pdf.js';

function item(str: string, y: number): PdfTextItem {
  return { str, transform: [1, 0, 0, 1, 72, y] };
}

function fakePage(items: PdfTextItem[]): PdfPage {
  return { getTextContent: vi.fn(async () => ({ items })) };
}

describe('renderPageText', () => {
  it('joins runs on one baseline and breaks lines when it moves', () => {
    expect(
      renderPageText([item('PASSENGER ', 700), item('MANIFEST', 700), item('J. SMITH', 680), item('R. HALE', 660)])
    ).toBe('PASSENGER MANIFEST\nJ. SMITH\nR. HALE');
  });

  it('is empty for a page without text', () => {
    expect(renderPageText([])).toBe('');
  });
});

describe('createPageCollector', () => {
  it('keeps each rendered page in order, blank lines included', async () => {
    const collector = createPageCollector();

    await expect(collector.pagerender(fakePage([item('Page one', 700), item('', 680), item('end', 660)]))).resolves.toBe(
      'Page one\n\nend'
    );
    await expect(collector.pagerender(fakePage([item('Page two', 700)]))).resolves.toBe('Page two');

    expect(collector.pages).toEqual(['Page one\n\nend', 'Page two']);
  });

  it('asks pdf.js for uncombined, unnormalized text', async () => {
    const page = fakePage([]);
    await createPageCollector().pagerender(page);
    expect(page.getTextContent).toHaveBeenCalledWith({
      normalizeWhitespace: false,
      disableCombineTextItems: false,
    });
  });

  it('lets a blank line inside a page stay within that page for artifact checks', async () => {
    const collector = createPageCollector();
    const equals = '='.repeat(11);
    await collector.pagerender(fakePage([item(equals, 700), item('', 680), item(equals, 660)]));
    await collector.pagerender(fakePage([item('clean', 700)]));

    expect(collector.pages).toHaveLength(2);
    expect(hasEncodingArtifacts(collector.pages)).toBe(true);
  });
});
