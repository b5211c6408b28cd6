/**
 * Placeholder Substitution
 *
 * Runs before scanning. String values replace literal `<key>` text in one
 * left-to-right pass (a substituted value is never rescanned); node values
 * are collected into a map that tag resolution consults later.
 */

import { PlaceholderError } from './parser-interfaces.js';
import type { StyledNode } from './text-node.js';

export enum TemplateKind {
  String = 'string',
  Node = 'node'
}

export interface StringTemplate {
  readonly kind: TemplateKind.String;
  readonly key: string;
  readonly value: string;
}

export interface NodeTemplate {
  readonly kind: TemplateKind.Node;
  readonly key: string;
  readonly value: StyledNode;
}

export type Template = StringTemplate | NodeTemplate;

export function stringTemplate(key: string, value: string): StringTemplate {
  return { kind: TemplateKind.String, key, value };
}

export function nodeTemplate(key: string, value: StyledNode): NodeTemplate {
  return { kind: TemplateKind.Node, key, value };
}

type Replacement = readonly [key: string, value: string];

/**
 * Replaces `<key>` with value for each pair of a flat key/value list.
 * An odd-length list throws before anything is replaced.
 */
export function replacePlaceholders(text: string, placeholders: readonly string[]): string {
  if (placeholders.length % 2 !== 0) {
    throw new PlaceholderError(
      'Invalid number of placeholders: expected key/value pairs, got ' + placeholders.length + ' arguments'
    );
  }

  const pairs: Replacement[] = [];
  for (let i = 0; i < placeholders.length; i += 2) {
    pairs.push([placeholders[i], placeholders[i + 1]]);
  }
  return substitute(text, pairs);
}

/**
 * Replaces `<key>` with value for every entry of the map
 */
export function replacePlaceholderMap(
  text: string,
  placeholders: Readonly<Record<string, string>> | ReadonlyMap<string, string>
): string {
  const pairs: Replacement[] = isReadonlyMap(placeholders)
    ? Array.from(placeholders.entries())
    : Object.entries(placeholders);
  return substitute(text, pairs);
}

/**
 * Substitutes string templates and collects node templates by lowercased
 * key. For duplicate keys the first template wins, in both forms.
 */
export function applyTemplates(
  text: string,
  templates: readonly Template[]
): { text: string; templates: Map<string, NodeTemplate> } {
  const pairs: Replacement[] = [];
  const nodes = new Map<string, NodeTemplate>();

  for (const template of templates) {
    if (template.kind === TemplateKind.String) {
      pairs.push([template.key, template.value]);
    } else {
      addNodeTemplate(nodes, template);
    }
  }

  return { text: substitute(text, pairs), templates: nodes };
}

/**
 * Collects node templates by lowercased key, first one winning
 */
export function templateMap(templates: readonly NodeTemplate[]): Map<string, NodeTemplate> {
  const nodes = new Map<string, NodeTemplate>();
  for (const template of templates) addNodeTemplate(nodes, template);
  return nodes;
}

function addNodeTemplate(nodes: Map<string, NodeTemplate>, template: NodeTemplate): void {
  // Tag names resolve case-insensitively
  const key = template.key.toLowerCase();
  if (!nodes.has(key)) nodes.set(key, template);
}

function substitute(text: string, pairs: readonly Replacement[]): string {
  if (pairs.length === 0) return text;

  let output = '';
  let copied = 0;
  let open = text.indexOf('<');
  while (open >= 0) {
    const match = pairs.find(([key]) => isPlaceholderAt(text, open, key));
    if (match) {
      output += text.slice(copied, open) + match[1];
      copied = open + match[0].length + 2;
      open = text.indexOf('<', copied);
    } else {
      open = text.indexOf('<', open + 1);
    }
  }

  return output + text.slice(copied);
}

function isPlaceholderAt(text: string, open: number, key: string): boolean {
  return text.startsWith(key, open + 1) && text.charAt(open + 1 + key.length) === '>';
}

function isReadonlyMap(
  value: Readonly<Record<string, string>> | ReadonlyMap<string, string>
): value is ReadonlyMap<string, string> {
  return value instanceof Map;
}
