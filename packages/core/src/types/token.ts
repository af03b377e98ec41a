export enum TokenKind {
    Identifier = "Identifier",
    IntLiteral = "IntLiteral", // 123
    FloatLiteral = "FloatLiteral", // 1.25
    BoolLiteral = "BoolLiteral", // true | false
    Keyword = "Keyword",
    Operator = "Operator",
    Separator = "Separator",
    Error = "Error", // text holds the diagnostic

    // End of input
    EOF = "EOF",
}

export const LEX_ERROR_CODES = [
    "illegal-character",
    "illegal-identifier",
    "illegal-number-format",
    "unterminated-comment",
] as const;

export type LexErrorCode = (typeof LEX_ERROR_CODES)[number];

export interface Loc {
    line: number;
    column: number;
}

export type Token = Readonly<
    {
        kind: TokenKind;
        text: string;
        /** Only set on `TokenKind.Error` tokens. */
        error?: LexErrorCode;
    } & Loc
>;

export const LEX_ERROR_MESSAGES: Record<LexErrorCode, string> = {
    "illegal-character": "illegal character",
    "illegal-identifier": "illegal identifier (starts with digit)",
    "illegal-number-format": "illegal number format",
    "unterminated-comment": "unterminated block comment",
};

/**
 * Numeric codes used by the token dump format. The end-of-input marker has
 * no code and is never written.
 */
export const TOKEN_KIND_CODES: Record<Exclude<TokenKind, TokenKind.EOF>, number> =
    {
        [TokenKind.Identifier]: 0,
        [TokenKind.IntLiteral]: 1,
        [TokenKind.FloatLiteral]: 2,
        [TokenKind.BoolLiteral]: 3,
        [TokenKind.Keyword]: 4,
        [TokenKind.Operator]: 5,
        [TokenKind.Separator]: 6,
        [TokenKind.Error]: 7,
    };

export function formatLexError(code: LexErrorCode, lexeme: string): string {
    return `${LEX_ERROR_MESSAGES[code]}: ${lexeme}`;
}

/**
 * Recovers the error code from an error token's text. Whitespace is ignored
 * since the dump reader strips it.
 */
export function lexErrorCodeOf(text: string): LexErrorCode | undefined {
    const compact = text.replace(/\s+/g, "");
    return LEX_ERROR_CODES.find((code) =>
        compact.startsWith(LEX_ERROR_MESSAGES[code].replace(/\s+/g, "")),
    );
}

export function describeToken(token: Token): string {
    return token.kind === TokenKind.EOF ? "end of input" : `'${token.text}'`;
}
