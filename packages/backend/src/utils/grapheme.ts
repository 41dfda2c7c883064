/**
 * Grapheme-safe string utilities using Intl.Segmenter.
 * Grid rows and target words are split with the same rules, so a letter
 * built from several code points still lines up with a single cell.
 */

import type { GraphemeToken } from '../types/models.js';

/**
 * The character a target word uses to mark a position that is not checked.
 */
export const SKIP_MARK: GraphemeToken = ' ';

const DEFAULT_LOCALE = 'en-US';

/**
 * Normalize a string to NFC (Canonical Decomposition followed by Canonical Composition).
 *
 * @param text - Input text to normalize
 * @returns NFC-normalized text
 */
export function normalizeNFC(text: string): string {
    return text.normalize('NFC');
}

/**
 * Segment a string into an array of grapheme clusters.
 *
 * @param text - Input text to segment
 * @param locale - BCP-47 locale code for segmentation rules
 * @returns Array of grapheme tokens
 *
 * @example
 * toGraphemes("café")  // ["c", "a", "f", "é"]
 */
export function toGraphemes(text: string, locale: string = DEFAULT_LOCALE): GraphemeToken[] {
    const segmenter = new Intl.Segmenter(locale, { granularity: 'grapheme' });
    const graphemes: GraphemeToken[] = [];
    for (const segment of segmenter.segment(normalizeNFC(text))) {
        graphemes.push(segment.segment);
    }
    return graphemes;
}

/**
 * Uppercase a single cell. A letter whose uppercase form is more than one
 * grapheme (`ß` becomes `SS`) stays as it is.
 */
export function toUpperGrapheme(grapheme: GraphemeToken, locale: string = DEFAULT_LOCALE): GraphemeToken {
    const [upper, ...rest] = toGraphemes(grapheme.toUpperCase(), locale);
    return upper !== undefined && rest.length === 0 ? upper : grapheme;
}

/**
 * Normalize, segment and uppercase a target word for matching.
 */
export function toSearchGraphemes(word: string, locale: string = DEFAULT_LOCALE): GraphemeToken[] {
    return toGraphemes(word, locale).map((grapheme) => toUpperGrapheme(grapheme, locale));
}

/**
 * Whether a locale is a well-formed BCP-47 tag that Intl.Segmenter accepts.
 */
export function isValidLocale(locale: string): boolean {
    try {
        Intl.Segmenter.supportedLocalesOf(locale);
        return true;
    } catch (error) {
        if (error instanceof RangeError) return false;
        throw error;
    }
}

/**
 * Whether a word has no letter to look for.
 */
export function isBlankWord(word: string): boolean {
    return word.split(SKIP_MARK).join('').length === 0;
}
