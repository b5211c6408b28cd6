/**
 * Styled Text Node Types
 *
 * The tree the interpreter produces. Nodes are immutable values; the only
 * mutable piece is the root builder in node-factory.ts.
 */

/**
 * Node kinds - each node type gets a unique identifier
 */
export enum NodeKind {
  /** Literal text content */
  Text,

  /** Client-resolved key binding */
  Keybind,

  /** Client-resolved translation key with arguments */
  Translatable,
}

export enum ClickAction {
  OpenUrl = 'open_url',
  OpenFile = 'open_file',
  RunCommand = 'run_command',
  SuggestCommand = 'suggest_command',
  ChangePage = 'change_page',
  CopyToClipboard = 'copy_to_clipboard',
}

export interface ClickEvent {
  action: ClickAction;
  value: string;
}

export interface HoverEvent {
  action: 'show_text';
  value: StyledNode;
}

/**
 * Style carried by a node. An absent field means "inherit".
 */
export interface TextStyle {
  color?: string;               // Lowercase #rrggbb
  bold?: boolean;
  italic?: boolean;
  underlined?: boolean;
  strikethrough?: boolean;
  obfuscated?: boolean;
  font?: string;
  insertion?: string;           // Text inserted into the chat box on shift-click
  clickEvent?: ClickEvent;
  hoverEvent?: HoverEvent;
}

export type Decoration = 'bold' | 'italic' | 'underlined' | 'strikethrough' | 'obfuscated';

/**
 * Base interface for all styled nodes
 */
export interface BaseNode {
  readonly kind: NodeKind;
  readonly style: Readonly<TextStyle>;
  readonly children: readonly StyledNode[];
}

export interface TextNode extends BaseNode {
  readonly kind: NodeKind.Text;
  readonly content: string;
}

export interface KeybindNode extends BaseNode {
  readonly kind: NodeKind.Keybind;
  readonly keybind: string;
}

export interface TranslatableNode extends BaseNode {
  readonly kind: NodeKind.Translatable;
  readonly key: string;
  readonly args: readonly StyledNode[];
}

export type StyledNode = TextNode | KeybindNode | TranslatableNode;
