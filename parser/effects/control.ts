/**
 * Control tags that style nothing themselves: `<reset>`, `<pre>`, `<newline>`
 */

import { createTextNode, type TextNodeBuilder } from '../node-factory.js';
import type { StyledNode } from '../text-node.js';
import {
  EffectFlags,
  EffectMode,
  type EffectContext,
  type InstantEffect,
  type OneShotEffect,
  type ScopedEffect,
  type TagEffect
} from './effect-types.js';
import type { TagDefinition } from './registry.js';

/**
 * Closes every open scope the moment it is parsed
 */
export class ResetEffect implements InstantEffect {
  readonly mode = EffectMode.Instant;
  readonly flags = EffectFlags.None;

  constructor(readonly name: string) {}

  applyInstant(_builder: TextNodeBuilder, context: EffectContext): void {
    context.scope.clear();
  }
}

/**
 * Suspends tag interpretation until `</pre>`
 */
export class PreEffect implements ScopedEffect {
  readonly mode = EffectMode.Scoped;
  readonly flags = EffectFlags.RawMode;

  constructor(readonly name: string) {}

  apply(node: StyledNode): StyledNode {
    return node;
  }

  equals(other: TagEffect): boolean {
    return other instanceof PreEffect && other.name === this.name;
  }
}

/**
 * Inserts a line break in front of the next content node
 */
export class NewlineEffect implements OneShotEffect {
  readonly mode = EffectMode.OneShot;
  readonly flags = EffectFlags.Inserting;

  constructor(readonly name: string) {}

  applyOnce(node: StyledNode | null, builder: TextNodeBuilder): StyledNode | null {
    builder.append(createTextNode('\n', node?.style ?? {}));
    return node;
  }
}

export const resetTag: TagDefinition = {
  names: ['reset'],
  create: ({ name }) => new ResetEffect(name)
};

export const preTag: TagDefinition = {
  names: ['pre'],
  create: ({ name }) => new PreEffect(name)
};

export const newlineTag: TagDefinition = {
  names: ['newline', 'br'],
  create: ({ name }) => new NewlineEffect(name)
};
