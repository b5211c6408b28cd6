/**
 * Entry Points
 *
 * Glue from raw markup to a styled node: placeholder substitution, then
 * scanning, then interpretation. Also exposes the escape/strip utilities.
 */

import type { Logger } from 'pino';
import { createBuiltinRegistry } from './effects/builtin.js';
import { noPlaceholders, type PlaceholderResolver, type TagRegistry } from './effects/registry.js';
import { interpretTokens } from './interpreter.js';
import { createChildLogger, createLogger } from './logger.js';
import type {
  DiagnosticSink,
  ParseOptions,
  TagParser,
  TagParserOptions
} from './parser-interfaces.js';
import {
  applyTemplates,
  replacePlaceholderMap,
  replacePlaceholders,
  templateMap,
  type NodeTemplate,
  type Template
} from './placeholders.js';
import { scanTokens } from './scanner/scanner.js';
import type { Token } from './scanner/token-types.js';
import { escapeTags, stripTags, unescapeTags } from './tag-text.js';
import type { StyledNode } from './text-node.js';

const DEFAULT_PARSE_OPTIONS: Required<Pick<ParseOptions, 'strict'>> = {
  strict: false
};

class MarkupTagParser implements TagParser {
  private readonly registry: TagRegistry;
  private readonly placeholderResolver: PlaceholderResolver;
  private readonly strict: boolean;
  private readonly onDiagnostic: DiagnosticSink;
  private readonly logger: Logger;

  constructor(options?: TagParserOptions) {
    const merged = { ...DEFAULT_PARSE_OPTIONS, ...options };
    this.logger = createChildLogger(merged.logger ?? createLogger(), { component: 'tag-parser' });
    this.registry = merged.registry ?? createBuiltinRegistry();
    this.placeholderResolver = merged.placeholderResolver ?? noPlaceholders;
    this.strict = merged.strict ?? DEFAULT_PARSE_OPTIONS.strict;
    this.onDiagnostic = merged.onDiagnostic ?? (diagnostic => {
      this.logger.info({ diagnostic }, diagnostic.message);
    });
  }

  parse(text: string, ...placeholders: string[]): StyledNode {
    return this.parseText(replacePlaceholders(text, placeholders), new Map());
  }

  parseWithMap(
    text: string,
    placeholders: Readonly<Record<string, string>> | ReadonlyMap<string, string>
  ): StyledNode {
    return this.parseText(replacePlaceholderMap(text, placeholders), new Map());
  }

  parseWithTemplates(text: string, templates: readonly Template[]): StyledNode {
    const applied = applyTemplates(text, templates);
    return this.parseText(applied.text, applied.templates);
  }

  parseTokens(tokens: readonly Token[], templates: readonly NodeTemplate[] = []): StyledNode {
    return this.interpret(tokens, templateMap(templates));
  }

  escapeTags(text: string): string {
    return escapeTags(text);
  }

  unescapeTags(text: string): string {
    return unescapeTags(text);
  }

  stripTags(text: string): string {
    return stripTags(text);
  }

  private parseText(text: string, templates: ReadonlyMap<string, NodeTemplate>): StyledNode {
    const tokens = scanTokens(text);
    this.logger.debug({ text, tokenCount: tokens.length }, 'scanned markup');
    return this.interpret(tokens, templates);
  }

  private interpret(tokens: readonly Token[], templates: ReadonlyMap<string, NodeTemplate>): StyledNode {
    return interpretTokens(tokens, {
      registry: this.registry,
      templates,
      placeholderResolver: this.placeholderResolver,
      strict: this.strict,
      onDiagnostic: this.onDiagnostic
    });
  }
}

/**
 * Parser factory function
 */
export function createTagParser(options?: TagParserOptions): TagParser {
  return new MarkupTagParser(options);
}

let defaultParser: TagParser | undefined;

/**
 * Parses with a shared lenient parser over the built-in tags
 */
export function parseMarkup(text: string, ...placeholders: string[]): StyledNode {
  defaultParser ??= createTagParser();
  return defaultParser.parse(text, ...placeholders);
}
