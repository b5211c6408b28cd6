/**
 * `<click:action:value>`; the value may itself contain separators (URLs)
 */

import { ClickAction } from '../text-node.js';
import type { TagDefinition } from './registry.js';
import { StyleEffect } from './style-effect.js';

const CLICK_ACTIONS: readonly string[] = Object.values(ClickAction);

function isClickAction(value: string): value is ClickAction {
  return CLICK_ACTIONS.includes(value);
}

export const clickTag: TagDefinition = {
  names: ['click'],
  create({ name, params }) {
    const action = params[0]?.toLowerCase();
    if (action === undefined || !isClickAction(action) || params.length < 2) return undefined;
    return new StyleEffect(name, { clickEvent: { action, value: params.slice(1).join(':') } });
  }
};
