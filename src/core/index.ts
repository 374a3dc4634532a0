/**
 * Core module barrel exports.
 *
 * @module core
 */

// Segmenter
export { classifyLine, renderLine, renderCodeBlock, segmentChat, splitLines } from './segmenter';

// Inline formatting
export { formatInline } from './inline-formatter';

// Escaping
export { escapeHtml } from './escape';

// Styles
export { ENML_STYLES, styled } from './styles';
export type { EnmlStyleName } from './styles';

// Types
export type { ChatLine, ChatLineKind, HeadingLevel, SpeakerRole } from './types';
