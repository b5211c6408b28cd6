/**
 * Inserting tags: `<key:key.jump>` and `<lang:chat.type.text:'<red>Steve':hi>`.
 *
 * They stay in scope like any scoped tag but insert their node only once,
 * in front of the first content they meet, or after the last node when
 * no content follows them.
 */

import { createKeybindNode, createTranslatableNode, type TextNodeBuilder } from '../node-factory.js';
import type { StyledNode, TextStyle } from '../text-node.js';
import { EffectFlags, EffectMode, type ScopedEffect, type TagEffect } from './effect-types.js';
import type { TagDefinition } from './registry.js';

abstract class InsertOnceEffect implements ScopedEffect {
  readonly mode = EffectMode.Scoped;
  readonly flags = EffectFlags.Inserting;
  private inserted = false;

  constructor(readonly name: string, protected readonly value: string) {}

  protected abstract create(style: Readonly<TextStyle>): StyledNode;

  apply(node: StyledNode, builder: TextNodeBuilder): StyledNode {
    if (!this.inserted) {
      this.inserted = true;
      builder.append(this.create(node.style));
    }
    return node;
  }

  equals(other: TagEffect): boolean {
    return other instanceof InsertOnceEffect &&
      other.constructor === this.constructor &&
      other.name === this.name &&
      other.value === this.value;
  }
}

export class KeybindEffect extends InsertOnceEffect {
  protected create(style: Readonly<TextStyle>): StyledNode {
    return createKeybindNode(this.value, style);
  }
}

export class TranslatableEffect extends InsertOnceEffect {
  constructor(name: string, key: string, private readonly args: readonly StyledNode[]) {
    super(name, key);
  }

  protected create(style: Readonly<TextStyle>): StyledNode {
    return createTranslatableNode(this.value, this.args, style);
  }
}

export const keybindTag: TagDefinition = {
  names: ['key'],
  create({ name, params }) {
    if (params.length === 0 || params[0] === '') return undefined;
    return new KeybindEffect(name, params.join(':'));
  }
};

export const translatableTag: TagDefinition = {
  names: ['lang', 'tr', 'translate'],
  create({ name, params, parseNested }) {
    if (params.length === 0 || params[0] === '') return undefined;
    return new TranslatableEffect(name, params[0], params.slice(1).map(parseNested));
  }
};
