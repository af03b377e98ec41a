import { Lexer } from "../src/lexer/Lexer";
import { decodeTokens, encodeTokens } from "../src/lexer/TokenStream";
import { Parser } from "../src/parser/Parser";
import { TokenKind } from "../src/types/token";
import { ParseError } from "../src/utils/Error";
import { serializeTree } from "../src/utils/tree";

describe("Token dump", () => {
    test("encode one line per token without EOF", () => {
        const dump = encodeTokens(new Lexer("int x;").tokenize());

        expect(dump).toBe(
            '(4, "int", 1, 1)\n(0, "x", 1, 5)\n(6, ";", 1, 6)\n',
        );
    });

    test("decode the positioned form", () => {
        const tokens = decodeTokens('(0, "x", 3, 7)\n(6, ";", 3, 8)\n');

        expect(tokens).toEqual([
            { kind: TokenKind.Identifier, text: "x", line: 3, column: 7 },
            { kind: TokenKind.Separator, text: ";", line: 3, column: 8 },
            { kind: TokenKind.EOF, text: "", line: 3, column: 9 },
        ]);
    });

    test("decode the two-field form without quotes", () => {
        const tokens = decodeTokens("(4, int)\n(0, x)\n");

        expect(tokens).toEqual([
            { kind: TokenKind.Keyword, text: "int", line: 0, column: 0 },
            { kind: TokenKind.Identifier, text: "x", line: 0, column: 0 },
            { kind: TokenKind.EOF, text: "", line: 0, column: 0 },
        ]);
    });

    test("skip lines that are not tokens", () => {
        const tokens = decodeTokens('\nheader\r\n(1, "42")\r\n\n');

        expect(tokens.map((t) => t.text)).toEqual(["42", ""]);
    });

    test("strip whitespace and recover error codes", () => {
        const [token] = decodeTokens(
            '(7, "illegal identifier (starts with digit): 5x", 1, 5)',
        );

        expect(token).toEqual({
            kind: TokenKind.Error,
            text: "illegalidentifier(startswithdigit):5x",
            error: "illegal-identifier",
            line: 1,
            column: 5,
        });
    });

    test("treat unknown codes as error tokens", () => {
        const [token] = decodeTokens('(9, "?")');

        expect(token.kind).toBe(TokenKind.Error);
        expect(token.error).toBeUndefined();
    });

    test("lexer output survives the dump", () => {
        const source = "int a;\nwhile (a < 3) a += 1;";
        const tokens = new Lexer(source).tokenize();

        expect(decodeTokens(encodeTokens(tokens))).toEqual(tokens);
    });

    test("parse from a dump as from the source", () => {
        const source = "float f = 1.5; if (f >= 1.0) { write f; }";
        const direct = new Parser(new Lexer(source).tokenize()).parse();
        const dumped = decodeTokens(
            encodeTokens(new Lexer(source).tokenize()),
        );

        expect(serializeTree(new Parser(dumped).parse())).toBe(
            serializeTree(direct),
        );
    });

    test("parser reports a lexical error read from a dump", () => {
        const dump = encodeTokens(new Lexer("x = @;").tokenize());

        let error: unknown;
        try {
            new Parser(decodeTokens(dump)).parse();
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(ParseError);
        expect(error).toMatchObject({
            code: "illegal-character",
            rawMessage: "Lexical error: illegalcharacter:@",
            loc: { line: 1, column: 5 },
        });
    });
});
