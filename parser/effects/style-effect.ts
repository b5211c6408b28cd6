/**
 * Scoped effect that restyles every content node it covers
 */

import { stylesEqual, withStyle } from '../node-factory.js';
import type { StyledNode, TextStyle } from '../text-node.js';
import { EffectFlags, EffectMode, type ScopedEffect, type TagEffect } from './effect-types.js';

export class StyleEffect implements ScopedEffect {
  readonly mode = EffectMode.Scoped;
  readonly flags = EffectFlags.None;

  constructor(readonly name: string, readonly style: Readonly<TextStyle>) {}

  apply(node: StyledNode): StyledNode {
    return withStyle(node, this.style);
  }

  equals(other: TagEffect): boolean {
    return other instanceof StyleEffect &&
      other.name === this.name &&
      stylesEqual(other.style, this.style);
  }
}
