/**
 * `<hover:show_text:'<red>text'>`; the text argument is parsed as markup
 */

import type { TagDefinition } from './registry.js';
import { StyleEffect } from './style-effect.js';

export const hoverTag: TagDefinition = {
  names: ['hover'],
  create({ name, params, parseNested }) {
    if (params[0]?.toLowerCase() !== 'show_text' || params.length < 2) return undefined;
    const value = parseNested(params.slice(1).join(':'));
    return new StyleEffect(name, { hoverEvent: { action: 'show_text', value } });
  }
};
