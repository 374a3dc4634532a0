import { segmentChat } from './core/segmenter';

/** XML declaration and ENML doctype that open every note body. */
export const ENML_HEADER =
  '<?xml version="1.0" encoding="UTF-8"?>' +
  '<!DOCTYPE en-note SYSTEM "http://xml.evernote.com/pub/enml2.dtd">' +
  '<en-note>';

export const ENML_FOOTER = '</en-note>';

/**
 * Convert a chat transcript to an ENML note body.
 *
 * Runs the block segmenter over the whole transcript (which in turn runs
 * the inline formatter on paragraph lines) and wraps the fragments in the
 * fixed ENML envelope. Total over all strings: the empty string yields an
 * envelope around a single `<br/>`.
 *
 * @example
 * ```ts
 * chatToEnml('# Hello');
 * // '<?xml ...?><!DOCTYPE en-note ...><en-note><h1>Hello</h1></en-note>'
 * ```
 */
export function chatToEnml(content: string): string {
  return ENML_HEADER + segmentChat(content).join('') + ENML_FOOTER;
}
