import { classifyLine, renderLine, segmentChat, splitLines } from '../../src/core/segmenter';
import { ENML_STYLES } from '../../src/core/styles';

// ---------------------------------------------------------------------------
// classifyLine
// ---------------------------------------------------------------------------

describe('classifyLine', () => {
  it.each([
    ['```', { kind: 'fence' }],
    ['```ts', { kind: 'fence' }],
    ['', { kind: 'blank' }],
    ['   \t', { kind: 'blank' }],
    ['# One', { kind: 'heading', level: 1, text: 'One' }],
    ['## Two', { kind: 'heading', level: 2, text: 'Two' }],
    ['### Three', { kind: 'heading', level: 3, text: 'Three' }],
    ['Human: hi', { kind: 'speaker', role: 'human', text: 'Human: hi' }],
    ['User: hi', { kind: 'speaker', role: 'human', text: 'User: hi' }],
    ['Assistant: hi', { kind: 'speaker', role: 'assistant', text: 'Assistant: hi' }],
    ['Claude: hi', { kind: 'speaker', role: 'assistant', text: 'Claude: hi' }],
    ['- item', { kind: 'bullet', text: 'item' }],
    ['  * item ', { kind: 'bullet', text: 'item' }],
    ['1. First', { kind: 'numbered', text: '1. First' }],
    ['  12.  Twelfth', { kind: 'numbered', text: '  12.  Twelfth' }],
    ['Just text', { kind: 'plain', text: 'Just text' }],
  ] as const)('classifies %j', (line, expected) => {
    expect(classifyLine(line)).toEqual(expected);
  });

  it('does not treat a hash without a space as a heading', () => {
    expect(classifyLine('#hashtag').kind).toBe('plain');
  });

  it('does not treat #### as a level-3 heading', () => {
    expect(classifyLine('#### Four').kind).toBe('plain');
  });

  it('gives headings priority over speaker markers', () => {
    expect(classifyLine('# Human: notes')).toEqual({
      kind: 'heading',
      level: 1,
      text: 'Human: notes',
    });
  });

  it('requires the speaker marker at the start of the line', () => {
    expect(classifyLine(' Human: hi').kind).toBe('plain');
  });

  it('does not read a bold line as a bullet', () => {
    expect(classifyLine('**bold** start').kind).toBe('plain');
  });

  it('requires whitespace after the number', () => {
    expect(classifyLine('3.14 is pi').kind).toBe('plain');
  });
});

// ---------------------------------------------------------------------------
// renderLine
// ---------------------------------------------------------------------------

describe('renderLine', () => {
  it('renders a blank line as a line break', () => {
    expect(renderLine({ kind: 'blank' })).toBe('<br/>');
  });

  it('escapes heading text without inline formatting', () => {
    expect(renderLine({ kind: 'heading', level: 2, text: 'A & **B**' })).toBe(
      '<h2>A &amp; **B**</h2>',
    );
  });

  it('renders human speakers in blue', () => {
    expect(renderLine({ kind: 'speaker', role: 'human', text: 'Human: <hi>' })).toBe(
      `<div style="${ENML_STYLES.human}">Human: &lt;hi&gt;</div>`,
    );
  });

  it('renders assistant speakers in green', () => {
    expect(renderLine({ kind: 'speaker', role: 'assistant', text: 'Assistant: ok' })).toBe(
      `<div style="${ENML_STYLES.assistant}">Assistant: ok</div>`,
    );
  });

  it('prefixes bullets with a bullet glyph', () => {
    expect(renderLine({ kind: 'bullet', text: 'a < b' })).toBe('<div>• a &lt; b</div>');
  });

  it('keeps numbered lines verbatim', () => {
    expect(renderLine({ kind: 'numbered', text: '2. *Second*' })).toBe('<div>2. *Second*</div>');
  });

  it('runs plain lines through the inline formatter', () => {
    expect(renderLine({ kind: 'plain', text: 'so *very*' })).toBe('<div>so <em>very</em></div>');
  });

  it('renders nothing for a fence', () => {
    expect(renderLine({ kind: 'fence' })).toBe('');
  });
});

// ---------------------------------------------------------------------------
// splitLines
// ---------------------------------------------------------------------------

describe('splitLines', () => {
  it('treats a trailing newline as a terminator', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('keeps interior blank lines', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
  });

  it('returns one empty line for empty input and for a lone newline', () => {
    expect(splitLines('')).toEqual(['']);
    expect(splitLines('\n')).toEqual(['']);
  });

  it('drops only one trailing newline', () => {
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });
});

// ---------------------------------------------------------------------------
// segmentChat
// ---------------------------------------------------------------------------

describe('segmentChat', () => {
  const block = (text: string): string => `<div style="${ENML_STYLES.codeBlock}">${text}</div>`;

  it('emits one fragment per line', () => {
    expect(segmentChat('# T\n\nHello')).toEqual(['<h1>T</h1>', '<br/>', '<div>Hello</div>']);
  });

  it('collapses a fenced block into one fragment', () => {
    const input = ['Before', '```js', 'const f = (...a) =>', '  a < 1;', '```', 'After'].join('\n');
    expect(segmentChat(input)).toEqual([
      '<div>Before</div>',
      block('const f = (...a) =&gt;\n  a &lt; 1;'),
      '<div>After</div>',
    ]);
  });

  it('does not classify lines inside a fence', () => {
    const input = '```\n# not a heading\n- not a bullet\n\n**raw**\n```';
    expect(segmentChat(input)).toEqual([block('# not a heading\n- not a bullet\n\n**raw**')]);
  });

  it('flushes an unterminated fence at end of input', () => {
    expect(segmentChat('Intro\n```\nline 1\nline 2')).toEqual([
      '<div>Intro</div>',
      block('line 1\nline 2'),
    ]);
  });

  it('emits nothing for an unterminated fence with no lines', () => {
    expect(segmentChat('Intro\n```')).toEqual(['<div>Intro</div>']);
  });

  it('emits an empty block for an empty closed fence', () => {
    expect(segmentChat('```\n```')).toEqual([block('')]);
  });

  it('handles consecutive fenced blocks', () => {
    expect(segmentChat('```\na\n```\n```js\nb\n```')).toEqual([block('a'), block('b')]);
  });
});
