/**
 * Line-oriented block segmentation of chat transcripts.
 *
 * Walks the transcript one line at a time and emits one ENML fragment per
 * line. Fenced code blocks are the only multi-line construct: their lines
 * are collected and emitted as a single styled block when the fence closes
 * (or when the input ends with the fence still open).
 */

import { escapeHtml } from './escape';
import { formatInline } from './inline-formatter';
import { styled } from './styles';
import type { ChatLine, HeadingLevel, SpeakerRole } from './types';

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const FENCE = '```';

/** Longest prefix first, so `### x` is never read as `# ` + `## x`. */
const HEADING_PREFIXES: ReadonlyArray<readonly [string, HeadingLevel]> = [
  ['### ', 3],
  ['## ', 2],
  ['# ', 1],
];

const SPEAKER_PREFIXES: ReadonlyArray<readonly [string, SpeakerRole]> = [
  ['Human:', 'human'],
  ['User:', 'human'],
  ['Assistant:', 'assistant'],
  ['Claude:', 'assistant'],
];

const BULLET_MARKERS = ['- ', '* '] as const;

const NUMBERED_RE = /^\d+\.\s/;

/**
 * Classify a single line that is not inside a fenced code block.
 *
 * Checks run in priority order and the first match wins: fence, blank,
 * heading, speaker, bullet, numbered, plain.
 */
export function classifyLine(line: string): ChatLine {
  if (line.startsWith(FENCE)) {
    return { kind: 'fence' };
  }

  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'blank' };
  }

  for (const [prefix, level] of HEADING_PREFIXES) {
    if (line.startsWith(prefix)) {
      return { kind: 'heading', level, text: line.slice(prefix.length) };
    }
  }

  for (const [prefix, role] of SPEAKER_PREFIXES) {
    if (line.startsWith(prefix)) {
      return { kind: 'speaker', role, text: line };
    }
  }

  if (BULLET_MARKERS.some((marker) => trimmed.startsWith(marker))) {
    return { kind: 'bullet', text: trimmed.slice(2) };
  }

  if (NUMBERED_RE.test(trimmed)) {
    return { kind: 'numbered', text: line };
  }

  return { kind: 'plain', text: line };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render one classified line to its ENML fragment.
 *
 * Fence lines render to nothing; the code block they open or close is
 * emitted by {@link segmentChat}.
 */
export function renderLine(line: ChatLine): string {
  switch (line.kind) {
    case 'fence':
      return '';
    case 'blank':
      return '<br/>';
    case 'heading':
      return `<h${line.level}>${escapeHtml(line.text)}</h${line.level}>`;
    case 'speaker':
      return styled('div', line.role, escapeHtml(line.text));
    case 'bullet':
      return `<div>• ${escapeHtml(line.text)}</div>`;
    case 'numbered':
      return `<div>${escapeHtml(line.text)}</div>`;
    case 'plain':
      return `<div>${formatInline(line.text)}</div>`;
  }
}

/** Render collected code lines as a single preformatted block. */
export function renderCodeBlock(lines: readonly string[]): string {
  return styled('div', 'codeBlock', escapeHtml(lines.join('\n')));
}

// ---------------------------------------------------------------------------
// Segmentation
// ---------------------------------------------------------------------------

/**
 * Split text into lines. A trailing newline terminates the last line rather
 * than starting an empty one.
 */
export function splitLines(content: string): string[] {
  const lines = content.split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Split a chat transcript into ENML fragments, one per line, in order.
 *
 * An unterminated fence is not an error: whatever was collected after it is
 * flushed as a code block at the end of input.
 */
export function segmentChat(content: string): string[] {
  const fragments: string[] = [];
  let codeLines: string[] | null = null;

  for (const line of splitLines(content)) {
    if (codeLines !== null) {
      if (line.startsWith(FENCE)) {
        fragments.push(renderCodeBlock(codeLines));
        codeLines = null;
      } else {
        codeLines.push(line);
      }
      continue;
    }

    const classified = classifyLine(line);
    if (classified.kind === 'fence') {
      codeLines = [];
      continue;
    }
    fragments.push(renderLine(classified));
  }

  if (codeLines !== null && codeLines.length > 0) {
    fragments.push(renderCodeBlock(codeLines));
  }

  return fragments;
}
