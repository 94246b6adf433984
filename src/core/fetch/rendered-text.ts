// src/core/fetch/rendered-text.ts
import * as cheerio from 'cheerio';
import {
  GOAL_ELEMENT_HINTS,
  NUMERIC_AMOUNT_PATTERN,
  RENDERED_LINE_PATTERN,
  STRIPPED_ELEMENTS,
} from '../config/constants.js';

export const NO_RELEVANT_CONTENT = 'No relevant content found';

// Elements after which a line break is inserted when flattening to text
const BLOCK_ELEMENTS = 'address, article, aside, blockquote, br, dd, div, dl, dt, fieldset, figcaption, figure, footer, form, h1, h2, h3, h4, h5, h6, header, hr, li, main, nav, ol, p, pre, section, table, td, th, tr, ul';

function goalSelectors(): string {
  const attributeSelectors = GOAL_ELEMENT_HINTS.flatMap((hint) => [
    `[class*="${hint}" i]`,
    `[id*="${hint}" i]`,
  ]);
  return [...attributeSelectors, '[data-testid*="goal" i]', '[data-testid*="progress" i]'].join(', ');
}

/**
 * Flatten an HTML document to newline-separated text, one line per block element.
 * Scripts, styles and embedded objects never contribute text.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(STRIPPED_ELEMENTS).remove();
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append('\n');
  });
  return $('body').text() || $.root().text();
}

/**
 * Reduce a rendered page to the texts that can carry funding progress:
 * hinted elements (class, id, data-testid), keyword lines of the body text,
 * and numeric amounts with a currency or percent unit.
 */
export function extractRenderedGoalText(html: string): string {
  const $ = cheerio.load(html);
  $(STRIPPED_ELEMENTS).remove();

  const relevant = new Set<string>();

  $(goalSelectors()).each((_, el) => {
    const text = $(el).text().trim();
    if (text.length > 0 && text.length < 500) {
      relevant.add(text);
    }
  });

  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append('\n');
  });
  const bodyText = $('body').text();

  bodyText
    .split(/[\n\r]+/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line.length < 200)
    .filter((line) => RENDERED_LINE_PATTERN.test(line))
    .forEach((line) => relevant.add(line));

  for (const match of bodyText.match(NUMERIC_AMOUNT_PATTERN) ?? []) {
    relevant.add(match.trim());
  }

  const content = Array.from(relevant)
    .filter((text) => text.length > 2)
    .sort()
    .join('\n');

  return content || NO_RELEVANT_CONTENT;
}
