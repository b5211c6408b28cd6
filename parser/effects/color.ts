/**
 * Color tags: `<red>`, `<#ff5555>`, `<color:red>`, `<colour:#ff5555>`, `<c:red>`
 */

import { isHexDigit } from '../scanner/character-codes.js';
import type { TagDefinition } from './registry.js';
import { StyleEffect } from './style-effect.js';

export const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '#000000',
  dark_blue: '#0000aa',
  dark_green: '#00aa00',
  dark_aqua: '#00aaaa',
  dark_red: '#aa0000',
  dark_purple: '#aa00aa',
  gold: '#ffaa00',
  gray: '#aaaaaa',
  dark_gray: '#555555',
  blue: '#5555ff',
  green: '#55ff55',
  aqua: '#55ffff',
  red: '#ff5555',
  light_purple: '#ff55ff',
  yellow: '#ffff55',
  white: '#ffffff'
};

const COLOR_TAGS = ['color', 'colour', 'c'];

/**
 * Named color or `#rrggbb`, normalized to lowercase hex
 */
export function parseColor(value: string): string | undefined {
  const lower = value.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, lower)) return NAMED_COLORS[lower];
  return isHexColor(lower) ? lower : undefined;
}

function isHexColor(value: string): boolean {
  if (value.length !== 7 || value.charAt(0) !== '#') return false;
  for (let i = 1; i < value.length; i++) {
    if (!isHexDigit(value.charCodeAt(i))) return false;
  }
  return true;
}

export const colorTag: TagDefinition = {
  names: [...COLOR_TAGS, ...Object.keys(NAMED_COLORS)],
  matches: isHexColor,
  create({ name, params }) {
    const value = COLOR_TAGS.includes(name) ? params[0] : name;
    const color = value === undefined ? undefined : parseColor(value);
    return color ? new StyleEffect(name, { color }) : undefined;
  }
};
