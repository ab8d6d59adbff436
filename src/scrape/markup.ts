/**
 * markup.ts
 *
 * Decodes the inner HTML of a single table cell into text lines.
 * The portal separates fields inside a cell with <br>, so line structure
 * is the only thing that survives; tags themselves are discarded.
 */

import * as cheerio from 'cheerio';

// elements that start and end a line when rendered
const BLOCK_ELEMENTS = 'div, p, li, tr';

// Text lines of a cell, split at <br>/block elements and raw newlines; trimmed, empties dropped.
export function cellLines(html: string): string[] {
  const $ = cheerio.load(html, null, false);
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).before('\n').after('\n');

  return $.root()
    .text()
    .split(/\r?\n/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function cellText(html: string): string {
  return cellLines(html).join(' ');
}
