/**
 * USAS tag grammar.
 *
 * Re-exports the tag parsers as well as the lexer for direct access.
 */
export { parseUsasTag, parseUsasTagGroups, joinTagCodes, isUsasTagText } from "./parser.js";
export { TagLexer, allTokens } from "./lexer.js";
