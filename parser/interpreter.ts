/**
 * Tag Interpreter
 *
 * Walks a scanned token buffer, opens and closes effect scopes by tag name,
 * and assembles the styled node tree. Tags that turn out not to be tags
 * (unknown, escaped, inside raw mode, malformed in lenient mode) are
 * collapsed back into a single literal token and read as content.
 */

import {
  ActiveScope,
  EffectFlags,
  EffectMode,
  hasEffectFlag,
  OneShotQueue,
  type EffectContext,
  type TagEffect
} from './effects/effect-types.js';
import {
  noPlaceholders,
  type NestedParser,
  type PlaceholderResolver,
  type TagRegistry
} from './effects/registry.js';
import { createTextNode, emptyNode, TextNodeBuilder } from './node-factory.js';
import {
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseErrorCode,
  TagParseError,
  type DiagnosticSink,
  type ParseDiagnostic
} from './parser-interfaces.js';
import type { NodeTemplate } from './placeholders.js';
import { scanTokens } from './scanner/scanner.js';
import {
  createToken,
  describeToken,
  isEscapedTagStart,
  isTagStart,
  type Token,
  TokenKind
} from './scanner/token-types.js';
import type { StyledNode } from './text-node.js';

/**
 * Everything one interpretation needs besides the tokens
 */
export interface InterpretOptions {
  registry: TagRegistry;
  templates?: ReadonlyMap<string, NodeTemplate>;
  placeholderResolver?: PlaceholderResolver;
  strict?: boolean;
  onDiagnostic?: DiagnosticSink;
}

/**
 * Per-parse state. Owned by a single interpret() call.
 */
interface InterpreterState {
  tokens: Token[];
  index: number;
  builder: TextNodeBuilder;
  scope: ActiveScope;
  oneShots: OneShotQueue;
  effects: EffectContext;

  /** Name of the raw-mode tag currently suspending interpretation */
  rawTag: string | undefined;
}

/**
 * Span of a tag once its name and parameters have been read
 */
interface TagSpanTokens {
  name: Token;
  params: Token[];
  endIndex: number;
}

const NO_TEMPLATES: ReadonlyMap<string, NodeTemplate> = new Map();

/**
 * Interprets a token buffer into a styled node tree. The buffer is copied;
 * the caller's array is never modified.
 */
export function interpretTokens(tokens: readonly Token[], options: InterpretOptions): StyledNode {
  return new TagInterpreter(options).interpret(tokens);
}

class TagInterpreter {
  private readonly registry: TagRegistry;
  private readonly templates: ReadonlyMap<string, NodeTemplate>;
  private readonly placeholderResolver: PlaceholderResolver;
  private readonly strict: boolean;
  private readonly onDiagnostic: DiagnosticSink | undefined;
  private readonly parseNested: NestedParser;

  constructor(private readonly options: InterpretOptions) {
    this.registry = options.registry;
    this.templates = options.templates ?? NO_TEMPLATES;
    this.placeholderResolver = options.placeholderResolver ?? noPlaceholders;
    this.strict = options.strict ?? false;
    this.onDiagnostic = options.onDiagnostic;
    this.parseNested = text => new TagInterpreter(this.options).interpret(scanTokens(text));
  }

  interpret(input: readonly Token[]): StyledNode {
    const scope = new ActiveScope();
    const oneShots = new OneShotQueue();
    const state: InterpreterState = {
      tokens: input.slice(),
      index: 0,
      builder: new TextNodeBuilder(),
      scope,
      oneShots,
      effects: { scope, oneShots },
      rawTag: undefined
    };

    while (state.index < state.tokens.length) {
      const token = state.tokens[state.index];
      switch (token.kind) {
        case TokenKind.OpenTagStart:
        case TokenKind.EscapedOpenTagStart:
          this.parseOpenTag(state);
          break;

        case TokenKind.CloseTagStart:
        case TokenKind.EscapedCloseTagStart:
          this.parseCloseTag(state);
          break;

        default:
          this.appendContent(state, token);
          state.index++;
          break;
      }
    }

    this.flushEndOfStream(state);

    // A lone child needs no empty wrapper
    const root = state.builder.build();
    if (root.content === '' && root.children.length === 1) {
      return root.children[0];
    }
    return root;
  }

  private parseOpenTag(state: InterpreterState): void {
    const start = state.index;
    const tokens = state.tokens;
    const marker = tokens[start];
    const escaped = marker.kind === TokenKind.EscapedOpenTagStart;

    // An escaped marker right before a real tag start is just text
    if (escaped && start + 1 < tokens.length && isTagStart(tokens[start + 1].kind)) {
      this.collapse(state, start, start);
      return;
    }

    const span = this.readTagSpan(state, escaped || state.rawTag !== undefined, 'open tag');
    if (!span) return;

    const effect = escaped || state.rawTag !== undefined
      ? undefined
      : this.resolve(span);

    if (!effect) {
      if (!escaped && state.rawTag === undefined) {
        this.failUnresolved(span, '<', marker, tokens[span.endIndex]);
      }
      this.collapse(state, start, span.endIndex, escaped);
      return;
    }

    this.openEffect(state, effect);
    state.index = span.endIndex + 1;
    if (effect.mode === EffectMode.Scoped && hasEffectFlag(effect, EffectFlags.RawMode)) {
      this.collapseRawText(state);
    }
  }

  private parseCloseTag(state: InterpreterState): void {
    const start = state.index;
    const tokens = state.tokens;
    const marker = tokens[start];
    const escaped = marker.kind === TokenKind.EscapedCloseTagStart;

    const span = this.readTagSpan(state, escaped || state.rawTag !== undefined, 'close tag');
    if (!span) return;

    const name = span.name.text.toLowerCase();
    const suspended = state.rawTag !== undefined && state.rawTag !== name;
    if (escaped || suspended) {
      this.collapse(state, start, span.endIndex, escaped);
      return;
    }

    if (span.params.length === 0) {
      if (!this.registry.exists(name)) {
        this.failUnresolved(span, '</', marker, tokens[span.endIndex]);
        this.collapse(state, start, span.endIndex);
        return;
      }
      this.closeEffect(state, state.scope.removeLastNamed(name), span, marker);
    } else {
      // Parameters pick one of several same-named scopes by value
      const effect = this.resolve(span);
      if (!effect) {
        this.failUnresolved(span, '</', marker, tokens[span.endIndex]);
        this.collapse(state, start, span.endIndex);
        return;
      }
      const removed = effect.mode === EffectMode.Scoped ? state.scope.removeFirstEqual(effect) : undefined;
      this.closeEffect(state, removed, span, marker);
    }

    state.index = span.endIndex + 1;
  }

  /**
   * Reads name, separator and parameters after the start marker at
   * state.index. On a grammar violation reports it (or throws in strict
   * mode), collapses what was read into literal text and returns undefined.
   * A `literal` span (escaped, or inside raw mode) collapses without a report.
   */
  private readTagSpan(state: InterpreterState, literal: boolean, what: string): TagSpanTokens | undefined {
    const start = state.index;
    const tokens = state.tokens;
    const marker = tokens[start];
    const last = tokens.length - 1;

    if (start === last) {
      if (!literal) {
        this.fail(ParseErrorCode.MISSING_TAG_NAME, DiagnosticCategory.Syntax,
          'Expected name after ' + what + ' start, but got nothing', marker, marker);
      }
      this.collapse(state, start, start);
      return undefined;
    }

    const name = tokens[start + 1];
    if (name.kind !== TokenKind.Name) {
      if (!literal) {
        this.fail(ParseErrorCode.MISSING_TAG_NAME, DiagnosticCategory.Syntax,
          'Expected name after ' + what + ' start, but got ' + describeToken(name), marker, name);
      }
      this.collapse(state, start, start);
      return undefined;
    }

    if (start + 1 === last) {
      if (!literal) {
        this.fail(ParseErrorCode.MISSING_TAG_END, DiagnosticCategory.Syntax,
          'Expected param or end after ' + what + ' + name, but got nothing', marker, name, name.text);
      }
      this.collapse(state, start, start + 1);
      return undefined;
    }

    const paramOrEnd = tokens[start + 2];
    if (paramOrEnd.kind === TokenKind.TagEnd) {
      return { name, params: [], endIndex: start + 2 };
    }

    if (paramOrEnd.kind !== TokenKind.ParamSeparator) {
      if (!literal) {
        this.fail(ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Syntax,
          'Expected tag end or param separator after tag name, but got ' + describeToken(paramOrEnd),
          marker, paramOrEnd, name.text);
      }
      this.collapse(state, start, start + 1);
      return undefined;
    }

    let endIndex = start + 3;
    while (endIndex < tokens.length && tokens[endIndex].kind !== TokenKind.TagEnd) endIndex++;

    if (endIndex === tokens.length) {
      if (!literal) {
        this.fail(ParseErrorCode.MISSING_TAG_END, DiagnosticCategory.Syntax,
          'Expected end sometime after ' + what + ' + name, but got name = ' + name.text +
          ' and params = ' + tokens.slice(start + 3).map(token => token.text).join(''),
          marker, tokens[last], name.text);
      }
      this.collapse(state, start, last);
      return undefined;
    }

    return { name, params: tokens.slice(start + 3, endIndex), endIndex };
  }

  private resolve(span: TagSpanTokens): TagEffect | undefined {
    return this.registry.resolve(
      span.name.text,
      span.params,
      this.templates,
      this.placeholderResolver,
      this.parseNested
    );
  }

  private openEffect(state: InterpreterState, effect: TagEffect): void {
    switch (effect.mode) {
      case EffectMode.Instant:
        effect.applyInstant(state.builder, state.effects);
        break;

      case EffectMode.OneShot:
        state.oneShots.enqueue(effect);
        break;

      case EffectMode.Scoped:
        if (hasEffectFlag(effect, EffectFlags.RawMode)) {
          state.rawTag = effect.name;
        }
        state.scope.push(effect);
        break;
    }
  }

  private closeEffect(
    state: InterpreterState,
    removed: TagEffect | undefined,
    span: TagSpanTokens,
    marker: Token
  ): void {
    if (!removed) {
      this.report(ParseErrorCode.UNMATCHED_CLOSE, DiagnosticCategory.Structure, DiagnosticSeverity.Info,
        'Close tag </' + span.name.text + '> has no open tag to close', marker, state.tokens[span.endIndex],
        span.name.text);
      return;
    }
    if (hasEffectFlag(removed, EffectFlags.RawMode)) {
      state.rawTag = undefined;
    }
  }

  /**
   * Joins everything up to the raw tag's own close tag into one literal
   * token. With no such close tag the rest of the buffer is joined.
   */
  private collapseRawText(state: InterpreterState): void {
    const from = state.index;
    let to = from;
    while (to < state.tokens.length && !this.isRawClose(state, to)) to++;
    if (to > from) {
      this.collapse(state, from, to - 1);
    }
  }

  private isRawClose(state: InterpreterState, at: number): boolean {
    const marker = state.tokens[at];
    const name = state.tokens[at + 1];
    return marker.kind === TokenKind.CloseTagStart &&
      name !== undefined &&
      name.kind === TokenKind.Name &&
      name.text.toLowerCase() === state.rawTag;
  }

  private appendContent(state: InterpreterState, token: Token): void {
    let node: StyledNode | null = createTextNode(token.text);

    for (const effect of state.scope.toArray()) {
      node = effect.apply(node, state.builder);
      if (!node) break;
    }

    // Newest first; effects queued while draining are drained too
    let oneShot = state.oneShots.takeNewest();
    while (oneShot) {
      node = oneShot.applyOnce(node, state.builder, state.effects);
      oneShot = state.oneShots.takeNewest();
    }

    if (node) {
      state.builder.append(node);
    }
  }

  private flushEndOfStream(state: InterpreterState): void {
    const last = state.builder.lastChild() ?? emptyNode();

    let current: StyledNode | null = last;
    for (const effect of state.scope.toArray()) {
      if (!current) break;
      if (hasEffectFlag(effect, EffectFlags.Inserting)) {
        current = effect.apply(current, state.builder);
      }
    }

    // Oldest first here, unlike the mid-stream drain
    let oneShot = state.oneShots.takeOldest();
    while (oneShot) {
      oneShot.applyOnce(last, state.builder, state.effects);
      oneShot = state.oneShots.takeOldest();
    }
  }

  /**
   * Replaces tokens[from..to] with one literal token holding their text and
   * leaves the cursor on it. Every recovery goes through here, so each one
   * turns at least one tag start into content.
   *
   * `unescape` is set for a complete escaped tag: only then does the escape
   * character go. An escaped start that never became a tag keeps it.
   */
  private collapse(state: InterpreterState, from: number, to: number, unescape = false): void {
    const tokens = state.tokens;
    let text = tokens.slice(from, to + 1).map(token => token.text).join('');
    if (unescape && isEscapedTagStart(tokens[from].kind)) text = text.slice(1);
    tokens.splice(from, to - from + 1, createToken(TokenKind.String, text, tokens[from].pos, tokens[to].end));
    state.index = from;
  }

  private failUnresolved(span: TagSpanTokens, opening: string, from: Token, to: Token): void {
    const message = this.registry.exists(span.name.text)
      ? 'Invalid arguments for tag ' + opening + span.name.text + '>'
      : 'Unknown tag ' + opening + span.name.text + '>';
    this.fail(ParseErrorCode.UNKNOWN_TAG, DiagnosticCategory.Reference, message, from, to, span.name.text);
  }

  /**
   * Grammar violation: throws in strict mode, reports in lenient mode
   */
  private fail(
    code: ParseErrorCode,
    category: DiagnosticCategory,
    message: string,
    from: Token,
    to: Token,
    subject?: string
  ): void {
    const diagnostic = this.diagnostic(code, category,
      this.strict ? DiagnosticSeverity.Error : DiagnosticSeverity.Info, message, from, to, subject);
    if (this.strict) {
      throw new TagParseError(diagnostic);
    }
    this.onDiagnostic?.(diagnostic);
  }

  private report(
    code: ParseErrorCode,
    category: DiagnosticCategory,
    severity: DiagnosticSeverity,
    message: string,
    from: Token,
    to: Token,
    subject?: string
  ): void {
    this.onDiagnostic?.(this.diagnostic(code, category, severity, message, from, to, subject));
  }

  private diagnostic(
    code: ParseErrorCode,
    category: DiagnosticCategory,
    severity: DiagnosticSeverity,
    message: string,
    from: Token,
    to: Token,
    subject: string | undefined
  ): ParseDiagnostic {
    return { severity, category, code, message, subject, pos: from.pos, end: to.end };
  }
}
