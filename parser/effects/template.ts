/**
 * Node templates spliced in by tag name, e.g. `<player>`
 */

import { withStyleFallback, type TextNodeBuilder } from '../node-factory.js';
import type { StyledNode } from '../text-node.js';
import { EffectFlags, EffectMode, type OneShotEffect } from './effect-types.js';

/**
 * Appends the template in front of the next content node. The template keeps
 * its own style and inherits whatever it leaves unset from that node.
 */
export class TemplateEffect implements OneShotEffect {
  readonly mode = EffectMode.OneShot;
  readonly flags = EffectFlags.Inserting;

  constructor(readonly name: string, readonly value: StyledNode) {}

  applyOnce(node: StyledNode | null, builder: TextNodeBuilder): StyledNode | null {
    builder.append(node ? withStyleFallback(this.value, node.style) : this.value);
    return node;
  }
}

export function templateEffect(name: string, value: StyledNode): TemplateEffect {
  return new TemplateEffect(name, value);
}
