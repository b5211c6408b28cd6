/**
 * Decoration tags: `<bold>`, `<i>`, `<underlined:false>` and friends
 */

import type { Decoration, TextStyle } from '../text-node.js';
import type { TagDefinition } from './registry.js';
import { StyleEffect } from './style-effect.js';

const DECORATION_NAMES: Readonly<Record<Decoration, readonly string[]>> = {
  bold: ['bold', 'b'],
  italic: ['italic', 'i', 'em'],
  underlined: ['underlined', 'u'],
  strikethrough: ['strikethrough', 'st'],
  obfuscated: ['obfuscated', 'obf']
};

function decorationTag(decoration: Decoration): TagDefinition {
  return {
    names: DECORATION_NAMES[decoration],
    create({ name, params }) {
      const style: TextStyle = {};
      style[decoration] = params[0] !== 'false';
      return new StyleEffect(name, style);
    }
  };
}

export const decorationTags: readonly TagDefinition[] = [
  decorationTag('bold'),
  decorationTag('italic'),
  decorationTag('underlined'),
  decorationTag('strikethrough'),
  decorationTag('obfuscated')
];
