/**
 * Chevrotain-based lexer and statement parser for .dec decay files.
 *
 * Re-exports the public parse functions as well as the lexer for direct access.
 */
export { parseDeclarations, parseStatements } from "./parser.js";
export type { StatementParserOptions } from "./parser.js";
export { DecLexer, allTokens, tokenizeStatements } from "./lexer.js";
export type { Statement, StatementStream } from "./lexer.js";
