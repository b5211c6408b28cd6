/**
 * Tag Registry
 *
 * Maps a tag name (and its parameters) to an effect. Registries are
 * immutable: `register` returns a new one, so a registry can be shared by
 * any number of parses.
 */

import { createTextNode } from '../node-factory.js';
import type { NodeTemplate } from '../placeholders.js';
import { type Token, TokenKind } from '../scanner/token-types.js';
import type { StyledNode } from '../text-node.js';
import type { TagEffect } from './effect-types.js';
import { templateEffect } from './template.js';

/**
 * Resolves names that are neither registered tags nor templates
 */
export type PlaceholderResolver = (name: string) => StyledNode | undefined;

/**
 * Parses markup nested in a tag argument (e.g. hover text)
 */
export type NestedParser = (text: string) => StyledNode;

/**
 * What an effect factory receives
 */
export interface TagArguments {
  /** Tag name, lowercased */
  name: string;

  /** Parameter values split on separators, quotes removed */
  params: string[];

  /** Parses a parameter value as markup */
  parseNested: NestedParser;
}

export type EffectFactory = (args: TagArguments) => TagEffect | undefined;

export interface TagDefinition {
  /** Exact names, matched case-insensitively */
  names: readonly string[];

  /** Extra name test for open-ended names such as `#rrggbb` */
  matches?: (name: string) => boolean;

  create: EffectFactory;
}

export interface TagRegistry {
  /** `templates` is keyed by lowercased name, as `templateMap` builds it */
  resolve(
    name: string,
    params: readonly Token[],
    templates: ReadonlyMap<string, NodeTemplate>,
    placeholderResolver: PlaceholderResolver,
    parseNested?: NestedParser
  ): TagEffect | undefined;

  exists(name: string): boolean;

  register(definition: TagDefinition): TagRegistry;
}

export const noPlaceholders: PlaceholderResolver = () => undefined;

const plainTextParser: NestedParser = text => createTextNode(text);

/**
 * Creates a registry from tag definitions. A later definition shadows
 * earlier ones whenever its names or its matcher accept the name.
 */
export function createTagRegistry(definitions: readonly TagDefinition[] = []): TagRegistry {
  const newestFirst = definitions
    .map(definition => ({ definition, names: new Set(definition.names.map(name => name.toLowerCase())) }))
    .reverse();

  function find(name: string): TagDefinition | undefined {
    const lower = name.toLowerCase();
    const entry = newestFirst.find(({ definition, names }) => names.has(lower) || definition.matches?.(lower) === true);
    return entry?.definition;
  }

  return {
    resolve(name, params, templates, placeholderResolver, parseNested = plainTextParser) {
      const lower = name.toLowerCase();
      // Template maps are keyed by lowercased name
      const template = templates.get(lower);
      if (template && params.length === 0) {
        return templateEffect(lower, template.value);
      }

      const definition = find(name);
      if (definition) {
        return definition.create({
          name: lower,
          params: tagParams(params),
          parseNested
        });
      }

      const resolved = params.length === 0 ? placeholderResolver(name) : undefined;
      return resolved ? templateEffect(lower, resolved) : undefined;
    },

    exists(name) {
      return find(name) !== undefined;
    },

    register(definition) {
      return createTagRegistry([...definitions, definition]);
    }
  };
}

/**
 * Splits parameter tokens on separators and unquotes each value
 */
export function tagParams(tokens: readonly Token[]): string[] {
  if (tokens.length === 0) return [];
  const params: string[] = [];
  let current = '';
  for (const token of tokens) {
    if (token.kind === TokenKind.ParamSeparator) {
      params.push(unquote(current));
      current = '';
    } else {
      current += token.text;
    }
  }
  params.push(unquote(current));
  return params;
}

/**
 * Removes matching surrounding quotes and unescapes quotes inside
 */
export function unquote(value: string): string {
  if (value.length < 2) return value;
  const quote = value.charAt(0);
  if ((quote !== '\'' && quote !== '"') || value.charAt(value.length - 1) !== quote) return value;
  return value.slice(1, -1).replace(/\\(['"])/g, '$1');
}
