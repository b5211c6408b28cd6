/**
 * `<insert:text>` and `<font:key>`, both plain string style fields
 */

import type { TagDefinition } from './registry.js';
import { StyleEffect } from './style-effect.js';

export const insertionTag: TagDefinition = {
  names: ['insert', 'insertion'],
  create({ name, params }) {
    if (params.length === 0) return undefined;
    return new StyleEffect(name, { insertion: params.join(':') });
  }
};

export const fontTag: TagDefinition = {
  names: ['font'],
  create({ name, params }) {
    if (params.length === 0) return undefined;
    return new StyleEffect(name, { font: params.join(':') });
  }
};
