/**
 * The default tag catalog
 */

import { clickTag } from './click.js';
import { colorTag } from './color.js';
import { newlineTag, preTag, resetTag } from './control.js';
import { decorationTags } from './decoration.js';
import { hoverTag } from './hover.js';
import { fontTag, insertionTag } from './insertion.js';
import { keybindTag, translatableTag } from './inserting.js';
import { createTagRegistry, type TagDefinition, type TagRegistry } from './registry.js';

export const BUILTIN_TAGS: readonly TagDefinition[] = [
  colorTag,
  ...decorationTags,
  clickTag,
  hoverTag,
  insertionTag,
  fontTag,
  keybindTag,
  translatableTag,
  newlineTag,
  resetTag,
  preTag
];

export function createBuiltinRegistry(): TagRegistry {
  return createTagRegistry(BUILTIN_TAGS);
}
