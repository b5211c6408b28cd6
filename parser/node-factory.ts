/**
 * Styled Node Factory Utilities
 *
 * Helper functions for creating, restyling and comparing styled nodes,
 * plus the builder the interpreter appends into.
 */

import {
  NodeKind,
  type ClickEvent,
  type HoverEvent,
  type KeybindNode,
  type StyledNode,
  type TextNode,
  type TextStyle,
  type TranslatableNode
} from './text-node.js';

const STYLE_KEYS: readonly (keyof TextStyle)[] = [
  'color',
  'bold',
  'italic',
  'underlined',
  'strikethrough',
  'obfuscated',
  'font',
  'insertion',
  'clickEvent',
  'hoverEvent'
];

/**
 * Creates a literal text node
 */
export function createTextNode(
  content: string,
  style: TextStyle = {},
  children: readonly StyledNode[] = []
): TextNode {
  return {
    kind: NodeKind.Text,
    style,
    children,
    content
  };
}

/**
 * Creates a text node with no content, style or children
 */
export function emptyNode(): TextNode {
  return createTextNode('');
}

/**
 * Creates a key binding node
 */
export function createKeybindNode(keybind: string, style: TextStyle = {}): KeybindNode {
  return {
    kind: NodeKind.Keybind,
    style,
    children: [],
    keybind
  };
}

/**
 * Creates a translatable node
 */
export function createTranslatableNode(
  key: string,
  args: readonly StyledNode[] = [],
  style: TextStyle = {}
): TranslatableNode {
  return {
    kind: NodeKind.Translatable,
    style,
    children: [],
    key,
    args
  };
}

/**
 * Returns a copy of the node with the given style fields set, overriding
 * whatever the node had for those fields.
 */
export function withStyle<T extends StyledNode>(node: T, style: TextStyle): T {
  return { ...node, style: { ...node.style, ...definedFields(style) } };
}

/**
 * Returns a copy of the node where only the style fields it leaves unset are
 * taken from `style`.
 */
export function withStyleFallback<T extends StyledNode>(node: T, style: TextStyle): T {
  return { ...node, style: { ...definedFields(style), ...node.style } };
}

/**
 * Returns a copy of the node with its children replaced
 */
export function withChildren<T extends StyledNode>(node: T, children: readonly StyledNode[]): T {
  return { ...node, children };
}

function definedFields(style: TextStyle): TextStyle {
  const result: TextStyle = {};
  for (const key of STYLE_KEYS) {
    if (style[key] !== undefined) {
      Object.assign(result, { [key]: style[key] });
    }
  }
  return result;
}

/**
 * Deep structural equality of two nodes, including style and children
 */
export function nodesEqual(a: StyledNode, b: StyledNode): boolean {
  if (a === b) return true;
  if (!stylesEqual(a.style, b.style) || !childrenEqual(a.children, b.children)) return false;

  switch (a.kind) {
    case NodeKind.Text:
      return b.kind === NodeKind.Text && a.content === b.content;
    case NodeKind.Keybind:
      return b.kind === NodeKind.Keybind && a.keybind === b.keybind;
    case NodeKind.Translatable:
      return b.kind === NodeKind.Translatable && a.key === b.key && childrenEqual(a.args, b.args);
  }
}

function childrenEqual(a: readonly StyledNode[], b: readonly StyledNode[]): boolean {
  return a.length === b.length && a.every((child, index) => nodesEqual(child, b[index]));
}

/**
 * Field-by-field style equality; an absent field equals only an absent field
 */
export function stylesEqual(a: Readonly<TextStyle>, b: Readonly<TextStyle>): boolean {
  return a.color === b.color &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underlined === b.underlined &&
    a.strikethrough === b.strikethrough &&
    a.obfuscated === b.obfuscated &&
    a.font === b.font &&
    a.insertion === b.insertion &&
    clickEventsEqual(a.clickEvent, b.clickEvent) &&
    hoverEventsEqual(a.hoverEvent, b.hoverEvent);
}

function clickEventsEqual(a: ClickEvent | undefined, b: ClickEvent | undefined): boolean {
  if (!a || !b) return a === b;
  return a.action === b.action && a.value === b.value;
}

function hoverEventsEqual(a: HoverEvent | undefined, b: HoverEvent | undefined): boolean {
  if (!a || !b) return a === b;
  return a.action === b.action && nodesEqual(a.value, b.value);
}

/**
 * Mutable root builder. The interpreter owns one per parse and threads it
 * through every effect call; effects must not keep a reference to it.
 */
export class TextNodeBuilder {
  private readonly appended: StyledNode[] = [];

  constructor(readonly content: string = '', readonly style: TextStyle = {}) {}

  append(node: StyledNode): this {
    this.appended.push(node);
    return this;
  }

  children(): readonly StyledNode[] {
    return this.appended;
  }

  lastChild(): StyledNode | undefined {
    return this.appended[this.appended.length - 1];
  }

  build(): TextNode {
    return createTextNode(this.content, this.style, this.appended.slice());
  }
}
