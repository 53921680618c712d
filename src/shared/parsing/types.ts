/**
 * Parser-specific type definitions shared by the line-tree parser,
 * the VLAN range expander and the device facts extractor.
 */

// ============================================================================
// Logger Abstraction
// ============================================================================

/**
 * Logger interface for optional logging.
 * The parsing code only reports skipped input at debug level.
 */
export interface ParserLogger {
  info(msg: string): void;
  warn(msg: string): void;
  debug(msg: string): void;
  error(msg: string): void;
}

/**
 * No-op logger for when logging is not needed.
 */
export const nullLogger: ParserLogger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
  error: () => {}
};

// ============================================================================
// Line Tree
// ============================================================================

/**
 * One configuration line with its indentation depth and the deeper-indented
 * lines that follow it.
 */
export interface LineNode {
  /** Line text without leading and trailing whitespace */
  text: string;
  /** Count of leading whitespace characters */
  depth: number;
  /** 1-based line number in the source text */
  lineNumber: number;
  children: LineNode[];
}

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractOptions {
  logger?: ParserLogger;
}
