/**
 * Parser Interfaces and Types
 *
 * Options, diagnostics and errors shared by the interpreter and the
 * entry points.
 */

import type { Logger } from 'pino';
import type { PlaceholderResolver, TagRegistry } from './effects/registry.js';
import type { NodeTemplate, Template } from './placeholders.js';
import type { Token } from './scanner/token-types.js';
import type { StyledNode } from './text-node.js';

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Syntax = 'syntax',
  Structure = 'structure',
  Reference = 'reference'
}

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  MISSING_TAG_NAME = 'missing-tag-name',
  MISSING_TAG_END = 'missing-tag-end',
  UNEXPECTED_TOKEN = 'unexpected-token',
  UNKNOWN_TAG = 'unknown-tag',
  UNMATCHED_CLOSE = 'unmatched-close',
  INVALID_PLACEHOLDERS = 'invalid-placeholders'
}

/**
 * Parse diagnostic information
 */
export interface ParseDiagnostic {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Subject of the diagnostic (e.g. the tag name) */
  subject?: string;

  /** Start offset in the substituted text; -1 when unknown */
  pos: number;

  /** End offset in the substituted text; -1 when unknown */
  end: number;
}

export type DiagnosticSink = (diagnostic: ParseDiagnostic) => void;

/**
 * Thrown in strict mode on the first grammar violation
 */
export class TagParseError extends Error {
  readonly code: ParseErrorCode;
  readonly pos: number;
  readonly end: number;
  readonly diagnostic: ParseDiagnostic;

  constructor(diagnostic: ParseDiagnostic) {
    super(diagnostic.message);
    this.name = 'TagParseError';
    this.code = diagnostic.code;
    this.pos = diagnostic.pos;
    this.end = diagnostic.end;
    this.diagnostic = diagnostic;
  }
}

/**
 * Thrown for a malformed placeholder argument list, in either mode
 */
export class PlaceholderError extends Error {
  readonly code = ParseErrorCode.INVALID_PLACEHOLDERS;

  constructor(message: string) {
    super(message);
    this.name = 'PlaceholderError';
  }
}

/**
 * Per-parse options
 */
export interface ParseOptions {
  /** Throw on the first grammar violation instead of recovering (default: false) */
  strict?: boolean;

  /** Receives lenient-mode diagnostics (default: logs them at info) */
  onDiagnostic?: DiagnosticSink;
}

/**
 * Parser creation options
 */
export interface TagParserOptions extends ParseOptions {
  /** Tag catalog (default: the built-in registry) */
  registry?: TagRegistry;

  /** Resolves tag names that are neither registered nor templates (default: none) */
  placeholderResolver?: PlaceholderResolver;

  /** Logger for parse tracing and the default diagnostic sink */
  logger?: Logger;
}

/**
 * Main parser interface
 */
export interface TagParser {
  /**
   * Parse markup after replacing `<key>` with value for each flat key/value pair
   */
  parse(text: string, ...placeholders: string[]): StyledNode;

  /**
   * Parse markup after replacing `<key>` for every map entry
   */
  parseWithMap(text: string, placeholders: Readonly<Record<string, string>> | ReadonlyMap<string, string>): StyledNode;

  /**
   * Parse markup with typed templates: string templates are substituted into
   * the text, node templates are spliced in by tag resolution
   */
  parseWithTemplates(text: string, templates: readonly Template[]): StyledNode;

  /**
   * Interpret an already scanned token buffer
   */
  parseTokens(tokens: readonly Token[], templates?: readonly NodeTemplate[]): StyledNode;

  /** Prefix every tag-shaped span with the escape marker */
  escapeTags(text: string): string;

  /** Remove the escape markers escapeTags added */
  unescapeTags(text: string): string;

  /** Delete every tag-shaped span */
  stripTags(text: string): string;
}
