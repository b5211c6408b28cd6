/**
 * Styled Node Traversal
 *
 * Visitor pattern and utility functions for walking styled node trees.
 */

import {
  NodeKind,
  type KeybindNode,
  type StyledNode,
  type TextNode,
  type TranslatableNode
} from './text-node.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Visitor with optional methods for each node kind
 */
export interface NodeVisitor {
  /** Generic node visitor (called if no specific visitor is defined) */
  visitNode?(node: StyledNode, parent?: StyledNode): VisitResult;

  visitText?(node: TextNode, parent?: StyledNode): VisitResult;
  visitKeybind?(node: KeybindNode, parent?: StyledNode): VisitResult;
  visitTranslatable?(node: TranslatableNode, parent?: StyledNode): VisitResult;
}

/**
 * Walk a node tree top-down
 */
export function walkNodes(root: StyledNode, visitor: NodeVisitor): void {
  walkRecursive(root, visitor, undefined);
}

function walkRecursive(node: StyledNode, visitor: NodeVisitor, parent?: StyledNode): VisitResult {
  const result = callVisitorMethod(node, visitor, parent);

  if (result === VisitResult.Stop) return VisitResult.Stop;
  if (result === VisitResult.Skip) return VisitResult.Continue;

  for (const child of node.children) {
    if (walkRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return VisitResult.Continue;
}

function callVisitorMethod(node: StyledNode, visitor: NodeVisitor, parent?: StyledNode): VisitResult {
  switch (node.kind) {
    case NodeKind.Text:
      return visitor.visitText?.(node, parent) ??
             visitor.visitNode?.(node, parent) ??
             VisitResult.Continue;

    case NodeKind.Keybind:
      return visitor.visitKeybind?.(node, parent) ??
             visitor.visitNode?.(node, parent) ??
             VisitResult.Continue;

    case NodeKind.Translatable:
      return visitor.visitTranslatable?.(node, parent) ??
             visitor.visitNode?.(node, parent) ??
             VisitResult.Continue;
  }
}

/**
 * Concatenated literal text of a tree, in document order.
 * Keybind and translatable nodes contribute their key.
 */
export function plainText(root: StyledNode): string {
  let text = '';
  walkNodes(root, {
    visitText(node) {
      text += node.content;
      return VisitResult.Continue;
    },
    visitKeybind(node) {
      text += node.keybind;
      return VisitResult.Continue;
    },
    visitTranslatable(node) {
      text += node.key;
      return VisitResult.Continue;
    }
  });
  return text;
}

/**
 * Counts the nodes in a tree, root included
 */
export function countNodes(root: StyledNode): number {
  let count = 0;
  walkNodes(root, {
    visitNode() {
      count++;
      return VisitResult.Continue;
    }
  });
  return count;
}
