import { describe, expect, test } from 'vitest';
import { createLogger } from '../logger.js';
import {
  createKeybindNode,
  createTextNode,
  createTranslatableNode,
  emptyNode
} from '../node-factory.js';
import { plainText } from '../node-traversal.js';
import type { ParseDiagnostic, TagParserOptions } from '../parser-interfaces.js';
import { nodeTemplate } from '../placeholders.js';
import { createTagParser } from '../tag-parser.js';
import { ClickAction } from '../text-node.js';

const RED = '#ff5555';
const BLUE = '#5555ff';
const GREEN = '#55ff55';

function collectingParser(options: TagParserOptions = {}) {
  const diagnostics: ParseDiagnostic[] = [];
  const parser = createTagParser({
    logger: createLogger({ level: 'silent' }),
    onDiagnostic: diagnostic => diagnostics.push(diagnostic),
    ...options
  });
  return { parser, diagnostics };
}

describe('Interpreter: scopes', () => {
  test('single styled run is returned without a wrapper', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<red>Hello</red>')).toEqual(createTextNode('Hello', { color: RED }));
  });

  test('plain text', () => {
    const { parser } = collectingParser();

    expect(parser.parse('Hello')).toEqual(createTextNode('Hello'));
  });

  test('empty input is an empty node', () => {
    const { parser } = collectingParser();

    expect(parser.parse('')).toEqual(emptyNode());
  });

  test('tags close by name, not in nesting order', () => {
    const { parser, diagnostics } = collectingParser();

    expect(parser.parse('<red>a<bold>b</red>c</bold>d')).toEqual(createTextNode('', {}, [
      createTextNode('a', { color: RED }),
      createTextNode('b', { color: RED, bold: true }),
      createTextNode('c', { bold: true }),
      createTextNode('d')
    ]));
    expect(diagnostics).toEqual([]);
  });

  test('close tag removes the newest scope with that name', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<color:red>a<color:blue>b</color>c')).toEqual(createTextNode('', {}, [
      createTextNode('a', { color: RED }),
      createTextNode('b', { color: BLUE }),
      createTextNode('c', { color: RED })
    ]));
  });

  test('close tag with parameters removes the matching scope', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<color:red>a<color:blue>b</color:red>c')).toEqual(createTextNode('', {}, [
      createTextNode('a', { color: RED }),
      createTextNode('b', { color: BLUE }),
      createTextNode('c', { color: BLUE })
    ]));
  });

  test('tag names are case-insensitive', () => {
    const { parser, diagnostics } = collectingParser();

    expect(parser.parse('<RED>x</red>y')).toEqual(createTextNode('', {}, [
      createTextNode('x', { color: RED }),
      createTextNode('y')
    ]));
    expect(diagnostics).toEqual([]);
  });

  test('hex color tag', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<#FF00AA>x')).toEqual(createTextNode('x', { color: '#ff00aa' }));
  });

  test('decoration can be switched off', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<bold>a<bold:false>b')).toEqual(createTextNode('', {}, [
      createTextNode('a', { bold: true }),
      createTextNode('b', { bold: false })
    ]));
  });

  test('reset closes every scope', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<red><italic>a<reset>b')).toEqual(createTextNode('', {}, [
      createTextNode('a', { color: RED, italic: true }),
      createTextNode('b')
    ]));
  });

  test('click value keeps its separators', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<click:open_url:https://example.com>x')).toEqual(createTextNode('x', {
      clickEvent: { action: ClickAction.OpenUrl, value: 'https://example.com' }
    }));
  });

  test('hover text is parsed as markup', () => {
    const { parser } = collectingParser();

    expect(parser.parse(`<hover:show_text:'<red>tip'>text`)).toEqual(createTextNode('text', {
      hoverEvent: { action: 'show_text', value: createTextNode('tip', { color: RED }) }
    }));
  });

  test('insertion and font', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<insert:hi there><font:uniform>x')).toEqual(
      createTextNode('x', { insertion: 'hi there', font: 'uniform' })
    );
  });
});

describe('Interpreter: raw mode and escapes', () => {
  test('pre content is one literal node', () => {
    const { parser, diagnostics } = collectingParser();

    expect(parser.parse('<pre><red>literal</red></pre>')).toEqual(createTextNode('<red>literal</red>'));
    expect(diagnostics).toEqual([]);
  });

  test('pre closes and interpretation resumes', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<pre><b>x</pre><b>y')).toEqual(createTextNode('', {}, [
      createTextNode('<b>x'),
      createTextNode('y', { bold: true })
    ]));
  });

  test('pre keeps the style of enclosing tags', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<red><pre></red>')).toEqual(createTextNode('</red>', { color: RED }));
  });

  test('unclosed pre runs to the end', () => {
    const { parser, diagnostics } = collectingParser();

    expect(parser.parse('<pre>a<b')).toEqual(createTextNode('a<b'));
    expect(diagnostics).toEqual([]);
  });

  test('escaped tag is text', () => {
    const { parser, diagnostics } = collectingParser();

    expect(parser.parse(String.raw`\<red>hi`)).toEqual(createTextNode('', {}, [
      createTextNode('<red>'),
      createTextNode('hi')
    ]));
    expect(diagnostics).toEqual([]);
  });

  test('escaped close tag is text', () => {
    const { parser } = collectingParser();

    expect(plainText(parser.parse(String.raw`<red>a\</red>b`))).toBe('a</red>b');
  });

  test('escape marker before a real tag start stays literal', () => {
    const { parser } = collectingParser();

    expect(parser.parse(String.raw`\<<red>x`)).toEqual(createTextNode('', {}, [
      createTextNode(String.raw`\<`),
      createTextNode('x', { color: RED })
    ]));
  });

  test('escape marker that never completes a tag keeps its backslash', () => {
    const { parser, diagnostics } = collectingParser();

    for (const text of [String.raw`path C:\<dir`, String.raw`a \<b c`, String.raw`end\<`, String.raw`\</x:y`]) {
      expect(plainText(parser.parse(text))).toBe(text);
    }
    expect(diagnostics).toEqual([]);
  });
});

describe('Interpreter: one-shot and inserting effects', () => {
  const steve = createTextNode('Steve', { color: GREEN });

  test('newline is inserted before the next content', () => {
    const { parser } = collectingParser();

    expect(parser.parse('a<br>b')).toEqual(createTextNode('', {}, [
      createTextNode('a'),
      createTextNode('\n'),
      createTextNode('b')
    ]));
  });

  test('newline affects only the first content after it', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<br>a<red>b</red>c')).toEqual(createTextNode('', {}, [
      createTextNode('\n'),
      createTextNode('a'),
      createTextNode('b', { color: RED }),
      createTextNode('c')
    ]));
  });

  test('newline takes the style of the content it precedes', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<red>a<newline>b')).toEqual(createTextNode('', {}, [
      createTextNode('a', { color: RED }),
      createTextNode('\n', { color: RED }),
      createTextNode('b', { color: RED })
    ]));
  });

  test('trailing newline is flushed at the end', () => {
    const { parser } = collectingParser();

    expect(parser.parse('a<br>')).toEqual(createTextNode('', {}, [
      createTextNode('a'),
      createTextNode('\n')
    ]));
  });

  test('node template is spliced in', () => {
    const { parser } = collectingParser();

    expect(parser.parseWithTemplates('Hi <player>!', [nodeTemplate('player', steve)])).toEqual(
      createTextNode('', {}, [createTextNode('Hi '), steve, createTextNode('!')])
    );
  });

  test('node template inherits only what it leaves unset', () => {
    const { parser } = collectingParser();

    expect(parser.parseWithTemplates('<bold><player> wins', [nodeTemplate('player', steve)])).toEqual(
      createTextNode('', {}, [
        createTextNode('Steve', { color: GREEN, bold: true }),
        createTextNode(' wins', { bold: true })
      ])
    );
  });

  test('node template names match in any case', () => {
    const { parser } = collectingParser();
    const expected = createTextNode('', {}, [createTextNode('Hi '), steve, createTextNode('!')]);

    expect(parser.parseWithTemplates('Hi <Player>!', [nodeTemplate('player', steve)])).toEqual(expected);
    expect(parser.parseWithTemplates('Hi <player>!', [nodeTemplate('PLAYER', steve)])).toEqual(expected);
  });

  test('node template at the end of input', () => {
    const { parser } = collectingParser();

    expect(parser.parseWithTemplates('Hi <player>', [nodeTemplate('player', steve)])).toEqual(
      createTextNode('', {}, [createTextNode('Hi '), steve])
    );
  });

  test('queued effects run newest first mid-stream', () => {
    const { parser } = collectingParser();

    expect(parser.parseWithTemplates('a<br><player>b', [nodeTemplate('player', steve)])).toEqual(
      createTextNode('', {}, [createTextNode('a'), steve, createTextNode('\n'), createTextNode('b')])
    );
  });

  test('queued effects run oldest first at the end', () => {
    const { parser } = collectingParser();

    expect(parser.parseWithTemplates('a<br><player>', [nodeTemplate('player', steve)])).toEqual(
      createTextNode('', {}, [createTextNode('a'), createTextNode('\n'), steve])
    );
  });

  test('placeholder resolver supplies unknown names', () => {
    const { parser, diagnostics } = collectingParser({
      placeholderResolver: name => name === 'coins' ? createTextNode('42') : undefined
    });

    expect(parser.parse('You have <coins> coins')).toEqual(createTextNode('', {}, [
      createTextNode('You have '),
      createTextNode('42'),
      createTextNode(' coins')
    ]));
    expect(diagnostics).toEqual([]);
  });

  test('keybind is inserted once, before the first content', () => {
    const { parser } = collectingParser();

    expect(parser.parse('Press <key:key.jump> to jump')).toEqual(createTextNode('', {}, [
      createTextNode('Press '),
      createKeybindNode('key.jump'),
      createTextNode(' to jump')
    ]));
  });

  test('inserted node takes the style of the content', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<red><key:key.jump>x')).toEqual(createTextNode('', {}, [
      createKeybindNode('key.jump', { color: RED }),
      createTextNode('x', { color: RED })
    ]));
  });

  test('inserting tag with no content after it is flushed', () => {
    const { parser } = collectingParser();

    expect(parser.parse('<key:key.jump>')).toEqual(createKeybindNode('key.jump'));
  });

  test('translatable arguments are parsed as markup', () => {
    const { parser } = collectingParser();

    expect(parser.parse(`<lang:chat.type.text:'<red>Steve':hi>`)).toEqual(
      createTranslatableNode('chat.type.text', [createTextNode('Steve', { color: RED }), createTextNode('hi')])
    );
  });
});
