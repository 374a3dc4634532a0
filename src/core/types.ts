/**
 * Line classifications produced by the block segmenter.
 *
 * Each input line outside a fenced code block maps to exactly one of these
 * variants. The order in which `classifyLine` tests them is the priority
 * order; see `segmenter.ts`.
 */

export type HeadingLevel = 1 | 2 | 3;

/** Who a speaker marker line belongs to. */
export type SpeakerRole = 'human' | 'assistant';

export type ChatLine =
  | { kind: 'fence' }
  | { kind: 'blank' }
  | { kind: 'heading'; level: HeadingLevel; text: string }
  | { kind: 'speaker'; role: SpeakerRole; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'numbered'; text: string }
  | { kind: 'plain'; text: string };

export type ChatLineKind = ChatLine['kind'];
