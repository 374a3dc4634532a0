/**
 * Inline Markdown formatting for a single line of chat text.
 *
 * Inline code spans are lifted out into a side table before anything else
 * happens, so that their contents are never seen by the bold/italic
 * patterns and are escaped exactly once when they are put back.
 */

import { escapeHtml } from './escape';
import { styled } from './styles';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const INLINE_CODE_RE = /`([^`]+)`/g;
const BOLD_RE = /\*\*([^*]+)\*\*/g;
const ITALIC_RE = /\*([^*]+)\*/g;

/**
 * Code spans are swapped for `\x00CODE{n}\x00`. NUL is stripped from the
 * input first and never touched by `escapeHtml`, so every match of
 * `PLACEHOLDER_RE` after escaping is one we inserted.
 */
const NUL_RE = /\x00/g;
const PLACEHOLDER_RE = /\x00CODE(\d+)\x00/g;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Convert inline code, bold and italic spans in one line to ENML.
 *
 * Steps, in order:
 * 1. replace every `` `code` `` span with an indexed placeholder
 * 2. escape the line
 * 3. `**bold**` to `<strong>`
 * 4. `*italic*` to `<em>` (after bold, so `**` pairs are consumed first)
 * 5. swap each placeholder for a styled, escaped `<span>`
 *
 * Delimiters without a closing partner on the same line are left as
 * literal text.
 *
 * @example
 * ```ts
 * formatInline('Call `f(*args)` **now**');
 * // 'Call <span style="...">f(*args)</span> <strong>now</strong>'
 * ```
 */
export function formatInline(line: string): string {
  const codeSpans: string[] = [];

  const shielded = line.replace(NUL_RE, '').replace(INLINE_CODE_RE, (_match, code: string) => {
    codeSpans.push(code);
    return `\x00CODE${codeSpans.length - 1}\x00`;
  });

  const formatted = escapeHtml(shielded)
    .replace(BOLD_RE, '<strong>$1</strong>')
    .replace(ITALIC_RE, '<em>$1</em>');

  return formatted.replace(PLACEHOLDER_RE, (_match, idx: string) =>
    styled('span', 'inlineCode', escapeHtml(codeSpans[parseInt(idx, 10)])),
  );
}
