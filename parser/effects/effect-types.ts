/**
 * Tag Effect Model
 *
 * Every resolved tag yields one effect. `mode` decides how the interpreter
 * schedules it; `flags` add the inserting and raw-mode capabilities.
 */

import type { TextNodeBuilder } from '../node-factory.js';
import type { StyledNode } from '../text-node.js';

/**
 * How the interpreter schedules an effect
 */
export enum EffectMode {
  /** Held in the active scope until a close tag of the same name removes it */
  Scoped,

  /** Runs once against the builder as soon as its tag is parsed */
  Instant,

  /** Queued, then consumed by the next content node */
  OneShot,
}

/**
 * Extra capabilities an effect may carry
 */
export enum EffectFlags {
  None = 0,

  /** Applied once more to the last node when the stream ends while still open */
  Inserting = 1 << 0,

  /** Suspends tag interpretation until its own close tag */
  RawMode = 1 << 1,
}

export interface ScopedEffect {
  readonly mode: EffectMode.Scoped;
  readonly name: string;
  readonly flags: EffectFlags;

  /** Returns the restyled node, or null when the effect consumed it */
  apply(node: StyledNode, builder: TextNodeBuilder): StyledNode | null;

  /** Value equality, used when a close tag with parameters picks its scope */
  equals(other: TagEffect): boolean;
}

export interface InstantEffect {
  readonly mode: EffectMode.Instant;
  readonly name: string;
  readonly flags: EffectFlags;

  applyInstant(builder: TextNodeBuilder, context: EffectContext): void;
}

export interface OneShotEffect {
  readonly mode: EffectMode.OneShot;
  readonly name: string;
  readonly flags: EffectFlags;

  applyOnce(node: StyledNode | null, builder: TextNodeBuilder, context: EffectContext): StyledNode | null;
}

export type TagEffect = ScopedEffect | InstantEffect | OneShotEffect;

/**
 * What instant and one-shot effects may touch while they run
 */
export interface EffectContext {
  readonly scope: ActiveScope;
  readonly oneShots: OneShotQueue;
}

export function hasEffectFlag(effect: TagEffect, flag: EffectFlags): boolean {
  return (effect.flags & flag) === flag;
}

/**
 * Open scoped effects in the order their tags were opened.
 * Removal is by name or value, searching from a chosen end, not strict LIFO.
 */
export class ActiveScope {
  private readonly entries: ScopedEffect[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(effect: ScopedEffect): void {
    this.entries.push(effect);
  }

  /**
   * Removes the most recently opened entry with the given name
   */
  removeLastNamed(name: string): ScopedEffect | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].name === name) {
        return this.entries.splice(i, 1)[0];
      }
    }
    return undefined;
  }

  /**
   * Removes the oldest entry equal to `effect`
   */
  removeFirstEqual(effect: TagEffect): ScopedEffect | undefined {
    const index = this.entries.findIndex(entry => entry.equals(effect));
    return index < 0 ? undefined : this.entries.splice(index, 1)[0];
  }

  clear(): void {
    this.entries.length = 0;
  }

  /** Snapshot, oldest first */
  toArray(): ScopedEffect[] {
    return this.entries.slice();
  }

  names(): string[] {
    return this.entries.map(entry => entry.name);
  }
}

/**
 * Deferred one-shot effects. Mid-stream the newest entry is consumed first,
 * at end of stream the oldest.
 */
export class OneShotQueue {
  private readonly entries: OneShotEffect[] = [];

  get size(): number {
    return this.entries.length;
  }

  enqueue(effect: OneShotEffect): void {
    this.entries.push(effect);
  }

  takeNewest(): OneShotEffect | undefined {
    return this.entries.pop();
  }

  takeOldest(): OneShotEffect | undefined {
    return this.entries.shift();
  }
}
