/**
 * Inline styles applied to ENML elements.
 *
 * ENML forbids `class` and `id` attributes, so every visual treatment is
 * carried by a `style` attribute on the emitted element.
 */

export type EnmlStyleName = 'codeBlock' | 'inlineCode' | 'human' | 'assistant';

export const ENML_STYLES: Readonly<Record<EnmlStyleName, string>> = {
  codeBlock:
    'font-family: monospace; background-color: #f5f5f5; padding: 10px; margin: 10px 0; white-space: pre-wrap;',
  inlineCode: 'font-family: monospace; background-color: #f0f0f0; padding: 2px 4px;',
  human: 'color: #0066cc; font-weight: bold; margin-top: 15px;',
  assistant: 'color: #009933; font-weight: bold; margin-top: 15px;',
};

/**
 * Wrap already-escaped content in a styled element.
 */
export function styled(tag: 'div' | 'span', style: EnmlStyleName, content: string): string {
  return `<${tag} style="${ENML_STYLES[style]}">${content}</${tag}>`;
}
