export { createScanner, scanTokens, type Scanner } from './scanner/scanner.js';
export * from './scanner/token-types.js';

export * from './text-node.js';
export * from './node-factory.js';
export * from './node-traversal.js';
export * from './parser-interfaces.js';

export { findTagSpans, type TagSpan } from './tag-span.js';
export { ESCAPE_MARKER, escapeTags, stripTags, unescapeTags } from './tag-text.js';
export * from './placeholders.js';

export * from './effects/effect-types.js';
export * from './effects/registry.js';
export { BUILTIN_TAGS, createBuiltinRegistry } from './effects/builtin.js';
export { NAMED_COLORS, parseColor } from './effects/color.js';
export { StyleEffect } from './effects/style-effect.js';

export { interpretTokens, type InterpretOptions } from './interpreter.js';
export { createTagParser, parseMarkup } from './tag-parser.js';
export { createLogger, type LoggerConfig, type LogLevel } from './logger.js';
