/**
 * HTML to plain text
 *
 * @module services/documents/html
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

export function extractHtmlText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  const root: Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();
  return root.text().replace(/\s+/g, ' ').trim();
}
