import { describe, expect, test } from 'vitest';
import { createTextNode } from '../node-factory.js';
import { ParseErrorCode, PlaceholderError } from '../parser-interfaces.js';
import {
  applyTemplates,
  nodeTemplate,
  replacePlaceholderMap,
  replacePlaceholders,
  stringTemplate,
  templateMap
} from '../placeholders.js';

describe('replacePlaceholders', () => {
  test('replaces each key', () => {
    expect(replacePlaceholders('Hello <name>!', ['name', 'Steve'])).toBe('Hello Steve!');
  });

  test('no pairs leaves text alone', () => {
    expect(replacePlaceholders('<name>', [])).toBe('<name>');
  });

  test('replaces every occurrence', () => {
    expect(replacePlaceholders('<x>-<x>', ['x', '1'])).toBe('1-1');
  });

  test('odd argument count throws', () => {
    expect(() => replacePlaceholders('<a>', ['a', '1', 'b'])).toThrow(
      new PlaceholderError('Invalid number of placeholders: expected key/value pairs, got 3 arguments')
    );
  });

  test('error carries its code', () => {
    let error: unknown;
    try {
      replacePlaceholders('', ['a']);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(PlaceholderError);
    expect(error).toMatchObject({ code: ParseErrorCode.INVALID_PLACEHOLDERS, name: 'PlaceholderError' });
  });

  test('substituted values are not rescanned', () => {
    expect(replacePlaceholders('<a>', ['a', '<b>', 'b', 'x'])).toBe('<b>');
  });

  test('first pair wins for a repeated key', () => {
    expect(replacePlaceholders('<a>', ['a', '1', 'a', '2'])).toBe('1');
  });

  test('key must be closed directly', () => {
    expect(replacePlaceholders('<name >', ['name', 'Steve'])).toBe('<name >');
  });
});

describe('replacePlaceholderMap', () => {
  test('plain object', () => {
    expect(replacePlaceholderMap('<x> and <y>', { x: '1', y: '2' })).toBe('1 and 2');
  });

  test('map', () => {
    expect(replacePlaceholderMap('<x> and <y>', new Map([['x', '1'], ['y', '2']]))).toBe('1 and 2');
  });
});

describe('templates', () => {
  const steve = createTextNode('Steve');

  test('string templates are substituted and node templates collected', () => {
    const player = nodeTemplate('player', steve);
    const applied = applyTemplates('Hi <name> <player>', [stringTemplate('name', 'Steve'), player]);

    expect(applied.text).toBe('Hi Steve <player>');
    expect(applied.templates.get('player')).toBe(player);
    expect(applied.templates.size).toBe(1);
  });

  test('first node template wins', () => {
    const first = nodeTemplate('player', steve);
    const map = templateMap([first, nodeTemplate('player', createTextNode('Alex'))]);

    expect(map.get('player')).toBe(first);
  });
});
