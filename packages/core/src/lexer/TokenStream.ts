import {
    TOKEN_KIND_CODES,
    Token,
    TokenKind,
    lexErrorCodeOf,
} from "../types/token";

const CODE_TO_KIND: ReadonlyMap<string, TokenKind> = new Map(
    Object.values(TokenKind)
        .filter(
            (kind): kind is Exclude<TokenKind, TokenKind.EOF> =>
                kind !== TokenKind.EOF,
        )
        .map((kind): [string, TokenKind] => [
            String(TOKEN_KIND_CODES[kind]),
            kind,
        ]),
);

// Trailing ", line, column" of the four-field variant
const POSITION_SUFFIX = /,\s*(\d+)\s*,\s*(\d+)\s*$/;

/**
 * Writes one `(code, "text", line, column)` line per token. The EOF marker is
 * not written.
 */
export function encodeTokens(tokens: readonly Token[]): string {
    let output = "";
    for (const token of tokens) {
        if (token.kind === TokenKind.EOF) continue;
        const code = TOKEN_KIND_CODES[token.kind];
        output += `(${code}, "${token.text}", ${token.line}, ${token.column})\n`;
    }
    return output;
}

/**
 * Reads a token dump back. Lines without both parentheses are skipped, the
 * `(code, text)` form is accepted as well as the positioned one, quotes are
 * optional and whitespace inside the value is dropped. Unknown codes become
 * error tokens. The result ends with an EOF token.
 */
export function decodeTokens(dump: string): Token[] {
    const tokens: Token[] = [];
    let lastLine = 0;
    let lastCol = 0;

    for (const raw of dump.split(/\r?\n/)) {
        const open = raw.indexOf("(");
        const close = raw.lastIndexOf(")");
        if (open === -1 || close === -1 || close < open) continue;

        const inner = raw.substring(open + 1, close);
        const comma = inner.indexOf(",");
        if (comma === -1) continue;

        const code = inner.substring(0, comma).trim();
        let rest = inner.substring(comma + 1);
        let line = 0;
        let column = 0;

        const position = POSITION_SUFFIX.exec(rest);
        if (position) {
            line = Number(position[1]);
            column = Number(position[2]);
            rest = rest.substring(0, position.index);
        }

        let text = rest.replace(/\s+/g, "");
        if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
            text = text.substring(1, text.length - 1);
        }

        const kind = CODE_TO_KIND.get(code) ?? TokenKind.Error;
        if (kind === TokenKind.Error) {
            const error = lexErrorCodeOf(text);
            tokens.push({ kind, text, error, line, column });
        } else {
            tokens.push({ kind, text, line, column });
        }

        if (line > 0) {
            lastLine = line;
            lastCol = column + text.length;
        }
    }

    tokens.push({
        kind: TokenKind.EOF,
        text: "",
        line: lastLine,
        column: lastCol,
    });
    return tokens;
}
