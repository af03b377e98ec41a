import { Lexer } from "./lexer/Lexer";
import { Parser, ParserOptions } from "./parser/Parser";
import { Program } from "./parser/statements";
import { Token } from "./types/token";
import { serializeTree } from "./utils/tree";

export { Lexer } from "./lexer/Lexer";
export { encodeTokens, decodeTokens } from "./lexer/TokenStream";
export { Parser, DEFAULT_MAX_DEPTH } from "./parser/Parser";
export type { ParserOptions } from "./parser/Parser";
export * from "./types/token";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./parser/declarations";
export * from "./parser/expressions";
export * from "./config/Config";
export * from "./utils/tree";
export {
    TinycError,
    ParseError,
    ConfigError,
    formatDiagnostic,
} from "./utils/Error";
export type {
    ErrorLocation,
    ParseErrorCode,
    ParseErrorDetails,
} from "./utils/Error";

export interface CompileResult {
    tokens: Token[];
    tree: Program;
    /** The serialized tree. */
    dump: string;
}

/**
 * Runs the whole front end over a source text. Lexical problems surface as a
 * ParseError once the parser reaches the offending token.
 */
export function compile(code: string, options?: ParserOptions): CompileResult {
    const tokens = new Lexer(code).tokenize();
    const tree = new Parser(tokens, code, options).parse();
    return { tokens, tree, dump: serializeTree(tree) };
}
