import {
    LexErrorCode,
    Token,
    TokenKind,
    formatLexError,
} from "../types/token";
import { BOOLEAN_LITERALS, KEYWORDS, OPERATORS, SEPARATORS } from "./symbols";

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private column: number = 1;

    constructor(input: string) {
        this.input = input;
    }

    /**
     * Drains the lexer. The returned list always ends with a single EOF token.
     */
    public tokenize(): Token[] {
        const tokens: Token[] = [];

        for (;;) {
            const token = this.nextToken();
            tokens.push(token);
            if (token.kind === TokenKind.EOF) return tokens;
        }
    }

    /**
     * Scans the next token. Malformed input comes back as an Error token;
     * once the input is exhausted every call returns EOF.
     */
    public nextToken(): Token {
        const unterminated = this.skipTrivia();
        if (unterminated) return unterminated;

        if (this.isAtEnd()) {
            return this.createToken(TokenKind.EOF, "", this.line, this.column);
        }

        const char = this.currentChar();

        if (this.isAlpha(char)) {
            return this.readIdentifier();
        }

        if (this.isDigit(char)) {
            return this.readNumber();
        }

        return this.readSymbol();
    }

    private createToken(
        kind: TokenKind,
        text: string,
        line: number,
        column: number,
    ): Token {
        return { kind, text, line, column };
    }

    private createError(
        code: LexErrorCode,
        lexeme: string,
        line: number,
        column: number,
    ): Token {
        return {
            kind: TokenKind.Error,
            text: formatLexError(code, lexeme),
            error: code,
            line,
            column,
        };
    }

    private advance(): string {
        const char = this.currentChar();
        if (char === "\n") {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }
        this.position += char.length;
        return char;
    }

    private isAtEnd(): boolean {
        return this.position >= this.input.length;
    }

    // A whole code point, so astral characters stay in one lexeme
    private currentChar(): string {
        const code = this.input.codePointAt(this.position);
        return code === undefined ? "" : String.fromCodePoint(code);
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    /**
     * Skips whitespace, `//` and `#` line comments and `/* *\/` block
     * comments. Returns an error token for a block comment that never closes.
     */
    private skipTrivia(): Token | null {
        while (!this.isAtEnd()) {
            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "#" || (char === "/" && this.peekChar() === "/")) {
                while (!this.isAtEnd() && this.currentChar() !== "\n") {
                    this.advance();
                }
                continue;
            }

            if (char === "/" && this.peekChar() === "*") {
                const startLine = this.line;
                const startCol = this.column;
                this.advance();
                this.advance();

                while (
                    !this.isAtEnd() &&
                    !(this.currentChar() === "*" && this.peekChar() === "/")
                ) {
                    this.advance();
                }

                if (this.isAtEnd()) {
                    return this.createError(
                        "unterminated-comment",
                        "/*",
                        startLine,
                        startCol,
                    );
                }

                this.advance();
                this.advance();
                continue;
            }

            break;
        }

        return null;
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.column;
        let value = "";

        while (!this.isAtEnd() && this.isAlphaNumeric(this.currentChar())) {
            value += this.advance();
        }

        if (BOOLEAN_LITERALS.has(value)) {
            return this.createToken(
                TokenKind.BoolLiteral,
                value,
                startLine,
                startCol,
            );
        }

        const kind = KEYWORDS.has(value)
            ? TokenKind.Keyword
            : TokenKind.Identifier;
        return this.createToken(kind, value, startLine, startCol);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.column;
        let value = "";
        let isFloat = false;
        let malformed = false;

        while (this.isDigit(this.currentChar())) {
            value += this.advance();
        }

        if (this.currentChar() === ".") {
            isFloat = true;
            value += this.advance();

            // "1." has no fraction digits
            if (!this.isDigit(this.currentChar())) malformed = true;
            while (this.isDigit(this.currentChar())) {
                value += this.advance();
            }

            // "1.2.3": the extra dot and its digits belong to the bad lexeme
            if (this.currentChar() === ".") {
                malformed = true;
                value += this.advance();
                while (this.isDigit(this.currentChar())) {
                    value += this.advance();
                }
            }
        }

        if (this.isAlpha(this.currentChar())) {
            while (this.isAlphaNumeric(this.currentChar())) {
                value += this.advance();
            }

            // "5x" reads as a misspelt identifier, "1.5e" as a bad number
            return this.createError(
                isFloat ? "illegal-number-format" : "illegal-identifier",
                value,
                startLine,
                startCol,
            );
        }

        if (malformed) {
            return this.createError(
                "illegal-number-format",
                value,
                startLine,
                startCol,
            );
        }

        return this.createToken(
            isFloat ? TokenKind.FloatLiteral : TokenKind.IntLiteral,
            value,
            startLine,
            startCol,
        );
    }

    /**
     * Operators and separators, longest match first.
     */
    private readSymbol(): Token {
        const startLine = this.line;
        const startCol = this.column;
        const first = this.currentChar();
        const pair = first + this.peekChar();

        if (pair.length === 2 && OPERATORS.has(pair)) {
            this.advance();
            this.advance();
            return this.createToken(
                TokenKind.Operator,
                pair,
                startLine,
                startCol,
            );
        }

        this.advance();

        if (OPERATORS.has(first)) {
            return this.createToken(
                TokenKind.Operator,
                first,
                startLine,
                startCol,
            );
        }

        if (SEPARATORS.has(first)) {
            return this.createToken(
                TokenKind.Separator,
                first,
                startLine,
                startCol,
            );
        }

        return this.createError(
            "illegal-character",
            first,
            startLine,
            startCol,
        );
    }
}
