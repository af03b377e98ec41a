import { compile } from "../src";
import { Lexer } from "../src/lexer/Lexer";
import { Parser } from "../src/parser/Parser";
import { BlockStatement, ForStatement } from "../src/parser/statements";
import { ParseError } from "../src/utils/Error";

function tree(...lines: string[]): string {
    return lines.map((line) => `${line}\n`).join("");
}

function parseFailure(code: string, maxDepth?: number): ParseError {
    try {
        new Parser(new Lexer(code).tokenize(), code, { maxDepth }).parse();
    } catch (e) {
        if (e instanceof ParseError) return e;
        throw e;
    }
    throw new Error(`expected '${code}' to fail`);
}

describe("Parser", () => {
    test("declarations and a while loop", () => {
        const { dump } = compile("int x = 1; while (x < 5) { x = x + 1; }");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "    [LIST]",
                "      [TYPE] int",
                "      [ID] x",
                "      [EXPR]",
                "        [NUM] 1",
                "  [STMTS]",
                "    [WHILE]",
                "      [BOOL]",
                "        [OP] <",
                "          [ID] x",
                "          [NUM] 5",
                "      [BLOCK]",
                "        [ASSIGN] =",
                "          [ID] x",
                "          [EXPR]",
                "            [OP] +",
                "              [ID] x",
                "              [NUM] 1",
            ),
        );
    });

    test("several declarators in one declaration", () => {
        const { dump } = compile("int a, b = 2; float f; bool ok = a < b;");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "    [LIST]",
                "      [TYPE] int",
                "      [ID] a",
                "      [ID] b",
                "      [EXPR]",
                "        [NUM] 2",
                "    [LIST]",
                "      [TYPE] float",
                "      [ID] f",
                "    [LIST]",
                "      [TYPE] bool",
                "      [ID] ok",
                "      [BOOL]",
                "        [OP] <",
                "          [ID] a",
                "          [ID] b",
                "  [STMTS]",
            ),
        );
    });

    test("bool declaration without initializer", () => {
        const { dump } = compile("bool f;");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "    [LIST]",
                "      [TYPE] bool",
                "      [ID] f",
                "  [STMTS]",
            ),
        );
    });

    test("if with else and single-statement branches", () => {
        const { dump } = compile("if (a > 0) b = 1; else b = 2;");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "  [STMTS]",
                "    [IF]",
                "      [BOOL]",
                "        [OP] >",
                "          [ID] a",
                "          [NUM] 0",
                "      [ASSIGN] =",
                "        [ID] b",
                "        [EXPR]",
                "          [NUM] 1",
                "      [ASSIGN] =",
                "        [ID] b",
                "        [EXPR]",
                "          [NUM] 2",
            ),
        );
    });

    test("for loop with all clauses", () => {
        const { dump } = compile("for (int i = 0; i < 3; i++) write i;");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "  [STMTS]",
                "    [FOR]",
                "      [LIST]",
                "        [TYPE] int",
                "        [ID] i",
                "        [EXPR]",
                "          [NUM] 0",
                "      [BOOL]",
                "        [OP] <",
                "          [ID] i",
                "          [NUM] 3",
                "      [ASSIGN] ++",
                "        [ID] i",
                "      [WRITE]",
                "        [ID] i",
            ),
        );
    });

    test("for loop with empty clauses", () => {
        const { tree: program, dump } = compile("for (;;) ;");
        const [loop] = program.statements.statements;

        if (!(loop instanceof ForStatement)) throw new Error("not a for loop");
        expect([loop.init, loop.condition, loop.update]).toEqual([
            null,
            null,
            null,
        ]);
        expect(dump).toBe(
            tree("[BLOCK]", "  [DECLS]", "  [STMTS]", "    [FOR]", "      [BLOCK]"),
        );
    });

    test("for loop with empty clauses and an empty block", () => {
        const { tree: program, dump } = compile("for (;;) { }");
        const [loop] = program.statements.statements;

        if (!(loop instanceof ForStatement)) throw new Error("not a for loop");
        expect([loop.init, loop.condition, loop.update]).toEqual([
            null,
            null,
            null,
        ]);
        expect(loop.body).toBeInstanceOf(BlockStatement);
        expect(loop.body.children).toHaveLength(0);
        expect(dump).toBe(
            tree("[BLOCK]", "  [DECLS]", "  [STMTS]", "    [FOR]", "      [BLOCK]"),
        );
    });

    test("for update expression ends at the header's parenthesis", () => {
        const { dump } = compile("for (i = 0; i < n; i = (i + 1) * 2) ;");

        expect(dump).toContain(
            tree(
                "      [ASSIGN] =",
                "        [ID] i",
                "        [EXPR]",
                "          [OP] *",
                "            [OP] +",
                "              [ID] i",
                "              [NUM] 1",
                "            [NUM] 2",
                "      [BLOCK]",
            ),
        );
    });

    test("read and write lists", () => {
        const { dump } = compile("read(a, b); write(a, b);");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "  [STMTS]",
                "    [READ]",
                "      [ID] a",
                "      [ID] b",
                "    [WRITE]",
                "      [ID] a",
                "      [ID] b",
            ),
        );
    });

    test("compound assignment and decrement", () => {
        const { dump } = compile("x += 2; x--;");

        expect(dump).toBe(
            tree(
                "[BLOCK]",
                "  [DECLS]",
                "  [STMTS]",
                "    [ASSIGN] +=",
                "      [ID] x",
                "      [EXPR]",
                "        [NUM] 2",
                "    [ASSIGN] --",
                "      [ID] x",
            ),
        );
    });

    test("empty statements leave no node", () => {
        const { dump } = compile("; { ; { } } ;");

        expect(dump).toBe(
            tree("[BLOCK]", "  [DECLS]", "  [STMTS]", "    [BLOCK]", "      [BLOCK]"),
        );
    });

    test("long unary chains serialize", () => {
        const { dump } = compile(`x = ${"~".repeat(2000)}a;`);
        const lines = dump.split("\n");

        expect(lines).toHaveLength(2008);
        expect(lines[2006]).toBe(`${"  ".repeat(2004)}[ID] a`);
    });
});

describe("Parser errors", () => {
    test("declaration after a statement", () => {
        const error = parseFailure("x = 1; int y;");

        expect(error.code).toBe("expected-token");
        expect(error.rawMessage).toBe(
            "Expected statement, found declaration of 'int'",
        );
        expect(error.hint).toBe(
            "Declarations must come before the first statement",
        );
        expect(error.loc).toMatchObject({ line: 1, column: 8 });
    });

    test("identifier not followed by an assignment", () => {
        const error = parseFailure("x y;");

        expect(error.code).toBe("expected-token");
        expect(error.rawMessage).toBe(
            "Expected assignment operator after 'x', found 'y'",
        );
        expect(error.expected).toBe("assignment operator");
        expect(error.loc).toMatchObject({ line: 1, column: 3 });
    });

    test("lone identifier at end of input", () => {
        const error = parseFailure("x");

        expect(error.code).toBe("unexpected-end-of-input");
        expect(error.rawMessage).toBe(
            "Expected assignment operator after 'x', found end of input",
        );
    });

    test("missing semicolon at end of input", () => {
        const error = parseFailure("x = 1");

        expect(error.code).toBe("unexpected-end-of-input");
        expect(error.rawMessage).toBe(
            "Expected ';' after assignment, found end of input",
        );
        expect(error.expected).toBe("';'");
    });

    test("missing parenthesis after if", () => {
        const error = parseFailure("if x < 1) y = 1;");

        expect(error.code).toBe("expected-token");
        expect(error.rawMessage).toBe("Expected '(' after 'if', found 'x'");
        expect(error.found).toBe("'x'");
        expect(error.loc).toMatchObject({ line: 1, column: 4 });
    });

    test("unclosed block", () => {
        const error = parseFailure("while (a < 1) { a = a + 1;");

        expect(error.code).toBe("unexpected-end-of-input");
        expect(error.rawMessage).toBe(
            "Expected '}' to end block, found end of input",
        );
    });

    test("lexical error surfaces with its own code", () => {
        const error = parseFailure("int 5x;");

        expect(error.code).toBe("illegal-identifier");
        expect(error.rawMessage).toBe(
            "Lexical error: illegal identifier (starts with digit): 5x",
        );
        expect(error.loc).toMatchObject({ line: 1, column: 5 });
    });

    test("statement keyword where an operand belongs", () => {
        const error = parseFailure("x = while;");

        expect(error.code).toBe("expected-token");
        expect(error.rawMessage).toBe(
            "Expected operand in expression, found 'while'",
        );
    });

    test("nesting beyond the configured depth", () => {
        const error = parseFailure("{{{{ }}}}", 3);

        expect(error.code).toBe("nesting-too-deep");
        expect(error.rawMessage).toBe(
            "Statements are nested deeper than 3 levels",
        );
        expect(error.loc).toMatchObject({ line: 1, column: 4 });
    });

    test("default depth limit stops runaway nesting", () => {
        const code = `${"{".repeat(300)}${"}".repeat(300)}`;

        expect(parseFailure(code).code).toBe("nesting-too-deep");
    });
});
