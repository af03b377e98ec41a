import { Token, TokenKind, describeToken } from "../types/token";
import { TYPE_KEYWORDS } from "../lexer/symbols";
import { ErrorLocation, ParseError, ParseErrorCode } from "../utils/Error";
import { NodeKind, SourceLocation, VariableType } from "./types";
import {
    BoolLiteral,
    BooleanExpressionNode,
    Expression,
    ExpressionNode,
    FloatLiteral,
    Identifier,
    IntLiteral,
    Operand,
    OperatorNode,
} from "./expressions";
import {
    Declaration,
    DeclarationList,
    Declarator,
    TypeName,
} from "./declarations";
import {
    AssignmentStatement,
    BlockStatement,
    ForInit,
    ForStatement,
    IfStatement,
    Program,
    ReadStatement,
    Statement,
    StatementList,
    WhileStatement,
    WriteStatement,
    isAssignmentOperator,
} from "./statements";
import {
    BINARY_PRECEDENCE,
    BOOLEAN_OPERATORS,
    NEGATION,
    POSTFIX_OPERATORS,
    PREFIX_OPERATORS,
    UNARY_PRECEDENCE,
} from "./precedence";

export const DEFAULT_MAX_DEPTH = 256;

export interface ParserOptions {
    /** Deepest statement nesting accepted before the parse is abandoned. */
    maxDepth?: number;
}

interface PendingOperator {
    type: "operator";
    symbol: string;
    arity: 1 | 2;
    prefix: boolean;
    precedence: number;
    token: Token;
}

interface OpenParen {
    type: "paren";
    token: Token;
}

const KIND_NAMES: Record<TokenKind, string> = {
    [TokenKind.Identifier]: "identifier",
    [TokenKind.IntLiteral]: "integer",
    [TokenKind.FloatLiteral]: "float",
    [TokenKind.BoolLiteral]: "boolean",
    [TokenKind.Keyword]: "keyword",
    [TokenKind.Operator]: "operator",
    [TokenKind.Separator]: "separator",
    [TokenKind.Error]: "error",
    [TokenKind.EOF]: "end of input",
};

const OPERAND_KINDS: ReadonlySet<TokenKind> = new Set([
    TokenKind.Identifier,
    TokenKind.IntLiteral,
    TokenKind.FloatLiteral,
    TokenKind.BoolLiteral,
]);

// Separators that end an expression without being part of it
const EXPRESSION_TERMINATORS: ReadonlySet<string> = new Set([";", ",", "{", "}"]);

export class Parser {
    private tokens: Token[];
    private current: number = 0;
    private depth: number = 0;
    private source?: string;
    private maxDepth: number;

    constructor(tokens: Token[], source?: string, options: ParserOptions = {}) {
        const last: Token | undefined = tokens[tokens.length - 1];
        if (last?.kind === TokenKind.EOF) {
            this.tokens = tokens;
        } else {
            this.tokens = [
                ...tokens,
                {
                    kind: TokenKind.EOF,
                    text: "",
                    line: last?.line ?? 1,
                    column: last ? last.column + last.text.length : 1,
                },
            ];
        }
        this.source = source;
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    }

    /**
     * Parses a whole program: the declaration section followed by the
     * statement section. Throws a ParseError on the first problem.
     */
    public parse(): Program {
        const start = this.getLoc(this.peek());
        const declarations = this.declarationList();
        const statements = this.statementList();
        return new Program(declarations, statements, start);
    }

    private getLoc(token: Token): SourceLocation {
        return { line: token.line, column: token.column };
    }

    private declarationList(): DeclarationList {
        const start = this.getLoc(this.peek());
        const declarations: Declaration[] = [];

        while (this.checkTypeKeyword()) {
            declarations.push(this.declaration());
        }

        return new DeclarationList(declarations, start);
    }

    private checkTypeKeyword(): boolean {
        return (
            this.check(TokenKind.Keyword) && TYPE_KEYWORDS.has(this.peek().text)
        );
    }

    private declaration(): Declaration {
        // int a, b = 2;
        const typeToken = this.advance();
        const type = new TypeName(
            this.variableType(typeToken),
            this.getLoc(typeToken),
        );
        const declarators: Declarator[] = [];

        do {
            const declarator: Declarator = {
                name: this.identifier("Expected variable name in declaration"),
            };
            if (this.match(TokenKind.Operator, "=")) {
                declarator.initializer =
                    type.text === "bool"
                        ? this.booleanExpression()
                        : this.expression();
            }
            declarators.push(declarator);
        } while (this.match(TokenKind.Separator, ","));

        this.consume(TokenKind.Separator, ";", "Expected ';' after declaration");

        return new Declaration(type, declarators, this.getLoc(typeToken));
    }

    private variableType(token: Token): VariableType {
        switch (token.text) {
            case "int":
                return "int";
            case "float":
                return "float";
            case "bool":
                return "bool";
        }
        throw this.unexpected("type name", "Expected type name");
    }

    private statementList(): StatementList {
        const start = this.getLoc(this.peek());
        const statements: Statement[] = [];

        while (!this.isAtEnd()) {
            const statement = this.statement();
            if (statement) statements.push(statement);
        }

        return new StatementList(statements, start);
    }

    /**
     * One statement, or null for a bare `;`.
     */
    private statement(): Statement | null {
        this.depth++;
        if (this.depth > this.maxDepth) {
            throw this.error(
                "nesting-too-deep",
                `Statements are nested deeper than ${this.maxDepth} levels`,
                this.peek(),
            );
        }

        const statement = this.dispatchStatement();
        this.depth--;
        return statement;
    }

    private dispatchStatement(): Statement | null {
        const token = this.peek();

        if (this.check(TokenKind.Separator, "{")) {
            return this.blockStatement();
        }

        if (this.match(TokenKind.Separator, ";")) {
            return null;
        }

        if (token.kind === TokenKind.Keyword) {
            switch (token.text) {
                case "if":
                    return this.ifStatement();
                case "while":
                    return this.whileStatement();
                case "for":
                    return this.forStatement();
                case "read":
                    return this.readStatement();
                case "write":
                    return this.writeStatement();
            }

            if (TYPE_KEYWORDS.has(token.text)) {
                throw this.error(
                    "expected-token",
                    `Expected statement, found declaration of '${token.text}'`,
                    token,
                    "statement",
                    "Declarations must come before the first statement",
                );
            }
        }

        if (token.kind === TokenKind.Identifier) {
            const next = this.peekNext();
            if (
                next.kind !== TokenKind.Operator ||
                !isAssignmentOperator(next.text)
            ) {
                this.advance();
                throw this.unexpected(
                    "assignment operator",
                    `Expected assignment operator after '${token.text}'`,
                );
            }
            return this.assignmentStatement();
        }

        throw this.unexpected("statement", "Expected statement");
    }

    private blockStatement(): BlockStatement {
        const startToken = this.consume(
            TokenKind.Separator,
            "{",
            "Expected '{' to start block",
        );
        const statements: Statement[] = [];

        while (!this.check(TokenKind.Separator, "}") && !this.isAtEnd()) {
            const statement = this.statement();
            if (statement) statements.push(statement);
        }

        this.consume(TokenKind.Separator, "}", "Expected '}' to end block");

        return new BlockStatement(statements, this.getLoc(startToken));
    }

    /**
     * Body of if/else/while/for: a block or a single statement, which takes
     * care of its own `;`. A lone `;` is an empty block.
     */
    private body(): Statement {
        if (this.check(TokenKind.Separator, "{")) {
            return this.blockStatement();
        }

        const start = this.getLoc(this.peek());
        return this.statement() ?? new BlockStatement([], start);
    }

    private ifStatement(): IfStatement {
        const ifToken = this.advance();
        this.consume(TokenKind.Separator, "(", "Expected '(' after 'if'");
        const condition = this.booleanExpression(true);
        this.consume(TokenKind.Separator, ")", "Expected ')' after condition");

        const thenBranch = this.body();
        const elseBranch = this.match(TokenKind.Keyword, "else")
            ? this.body()
            : undefined;

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.getLoc(ifToken),
        );
    }

    private whileStatement(): WhileStatement {
        const whileToken = this.advance();
        this.consume(TokenKind.Separator, "(", "Expected '(' after 'while'");
        const condition = this.booleanExpression(true);
        this.consume(TokenKind.Separator, ")", "Expected ')' after condition");

        return new WhileStatement(
            condition,
            this.body(),
            this.getLoc(whileToken),
        );
    }

    private forStatement(): ForStatement {
        const forToken = this.advance();
        this.consume(TokenKind.Separator, "(", "Expected '(' after 'for'");

        // Both initializer forms consume their own ';'
        let init: ForInit | null = null;
        if (this.checkTypeKeyword()) {
            init = this.declaration();
        } else if (!this.match(TokenKind.Separator, ";")) {
            init = this.assignmentStatement();
        }

        const condition = this.check(TokenKind.Separator, ";")
            ? null
            : this.booleanExpression();
        this.consume(
            TokenKind.Separator,
            ";",
            "Expected ';' after for condition",
        );

        const update = this.check(TokenKind.Separator, ")")
            ? null
            : this.assignmentStatement(true);
        this.consume(TokenKind.Separator, ")", "Expected ')' after for clauses");

        return new ForStatement(
            init,
            condition,
            update,
            this.body(),
            this.getLoc(forToken),
        );
    }

    private readStatement(): ReadStatement {
        const readToken = this.advance();
        this.consume(TokenKind.Separator, "(", "Expected '(' after 'read'");
        const targets = this.identifierList(
            "Expected variable name in read statement",
        );
        this.consume(
            TokenKind.Separator,
            ")",
            "Expected ')' after read arguments",
        );
        this.consume(
            TokenKind.Separator,
            ";",
            "Expected ';' after read statement",
        );

        return new ReadStatement(targets, this.getLoc(readToken));
    }

    private writeStatement(): WriteStatement {
        const writeToken = this.advance();
        const message = "Expected variable name in write statement";
        let values: Identifier[];

        if (this.match(TokenKind.Separator, "(")) {
            values = this.identifierList(message);
            this.consume(
                TokenKind.Separator,
                ")",
                "Expected ')' after write arguments",
            );
        } else {
            // write x;
            values = [this.identifier(message)];
        }

        this.consume(
            TokenKind.Separator,
            ";",
            "Expected ';' after write statement",
        );

        return new WriteStatement(values, this.getLoc(writeToken));
    }

    /**
     * `x = e;`, `x += e;`, `x++;` ... Inside a for header the update clause
     * has no `;` and its expression ends at the closing `)`.
     */
    private assignmentStatement(inForHeader = false): AssignmentStatement {
        const target = this.identifier("Expected identifier in assignment");
        const operator = this.peek().text;

        if (
            !this.check(TokenKind.Operator) ||
            !isAssignmentOperator(operator)
        ) {
            throw this.unexpected(
                "assignment operator",
                "Expected assignment operator",
            );
        }
        this.advance();

        let value: Expression | undefined;
        if (operator === "=") {
            value = this.looksBoolean()
                ? this.booleanExpression(inForHeader)
                : this.expression(inForHeader);
        } else if (operator !== "++" && operator !== "--") {
            value = this.expression(inForHeader);
        }

        if (!inForHeader) {
            this.consume(
                TokenKind.Separator,
                ";",
                "Expected ';' after assignment",
            );
        }

        return new AssignmentStatement(operator, target, value, target.loc);
    }

    // Syntactic guess only: types are checked later, if at all
    private looksBoolean(): boolean {
        return (
            this.check(TokenKind.BoolLiteral) ||
            this.check(TokenKind.Operator, "!") ||
            this.check(TokenKind.Identifier) ||
            this.check(TokenKind.Separator, "(")
        );
    }

    private identifier(message: string): Identifier {
        const token = this.consume(TokenKind.Identifier, null, message);
        return new Identifier(token.text, this.getLoc(token));
    }

    private identifierList(message: string): Identifier[] {
        const identifiers: Identifier[] = [];
        do {
            identifiers.push(this.identifier(message));
        } while (this.match(TokenKind.Separator, ","));
        return identifiers;
    }

    private expression(enclosed = false): ExpressionNode {
        const start = this.getLoc(this.peek());
        return new ExpressionNode(this.operatorPrecedence(enclosed), start);
    }

    /**
     * Same engine as `expression`; the result is only tagged boolean when
     * its root is a relational or logical operator.
     */
    private booleanExpression(enclosed = false): Expression {
        const start = this.getLoc(this.peek());
        const root = this.operatorPrecedence(enclosed);

        if (root.kind === NodeKind.Operator && BOOLEAN_OPERATORS.has(root.text)) {
            return new BooleanExpressionNode(root, start);
        }
        return new ExpressionNode(root, start);
    }

    /**
     * Two-stack operator-precedence evaluation. Scanning stops, without
     * consuming, at `;` `,` `{` `}` `else` or the end of input; when
     * `enclosed` is set a `)` with no open `(` also ends the expression.
     */
    private operatorPrecedence(enclosed: boolean): Operand {
        const operands: Operand[] = [];
        const operators: Array<PendingOperator | OpenParen> = [];
        let expectOperand = true;

        while (!this.atExpressionEnd()) {
            const token = this.peek();

            if (
                !expectOperand &&
                (OPERAND_KINDS.has(token.kind) ||
                    this.check(TokenKind.Separator, "("))
            ) {
                throw this.missingOperator(token);
            }

            if (this.check(TokenKind.Separator, "(")) {
                this.advance();
                operators.push({ type: "paren", token });
                expectOperand = true;
                continue;
            }

            if (this.check(TokenKind.Separator, ")")) {
                if (!operators.some((entry) => entry.type === "paren")) {
                    if (enclosed) break;
                    throw this.error(
                        "unmatched-parenthesis",
                        "Unmatched ')'",
                        token,
                    );
                }
                this.advance();

                let top = operators.pop();
                while (top && top.type === "operator") {
                    this.reduce(top, operands);
                    top = operators.pop();
                }
                expectOperand = false;
                continue;
            }

            if (token.kind === TokenKind.Operator) {
                this.advance();
                const operator = this.classifyOperator(token, expectOperand);

                if (!operator.prefix) {
                    // Equal precedence reduces first: left associativity
                    let top = operators.at(-1);
                    while (
                        top &&
                        top.type === "operator" &&
                        top.precedence >= operator.precedence
                    ) {
                        operators.pop();
                        this.reduce(top, operands);
                        top = operators.at(-1);
                    }
                }

                operators.push(operator);
                expectOperand = operator.arity === 2 || operator.prefix;
                continue;
            }

            operands.push(this.operand());
            expectOperand = false;
        }

        for (let top = operators.pop(); top; top = operators.pop()) {
            if (top.type === "paren") {
                throw this.error(
                    "unmatched-parenthesis",
                    "Unmatched '('",
                    top.token,
                );
            }
            this.reduce(top, operands);
        }

        // A second operand is rejected as soon as it appears
        const [result] = operands;
        if (!result) {
            throw this.isAtEnd()
                ? this.unexpected("expression", "Expected expression")
                : this.error(
                      "empty-expression",
                      `Expected expression, found ${describeToken(this.peek())}`,
                      this.peek(),
                      "expression",
                  );
        }
        return result;
    }

    private atExpressionEnd(): boolean {
        const token = this.peek();
        switch (token.kind) {
            case TokenKind.EOF:
                return true;
            case TokenKind.Separator:
                return EXPRESSION_TERMINATORS.has(token.text);
            case TokenKind.Keyword:
                return token.text === "else";
            default:
                return false;
        }
    }

    /**
     * Decides how an operator token acts from where it appears: in operand
     * position `-` is negation and `! ~ ++ --` are prefix, after an operand
     * `++`/`--` are postfix, everything else is binary.
     */
    private classifyOperator(
        token: Token,
        expectOperand: boolean,
    ): PendingOperator {
        const unary = (symbol: string, prefix: boolean): PendingOperator => ({
            type: "operator",
            symbol,
            arity: 1,
            prefix,
            precedence: UNARY_PRECEDENCE,
            token,
        });

        if (expectOperand && token.text === "-") return unary(NEGATION, true);
        if (expectOperand && PREFIX_OPERATORS.has(token.text)) {
            return unary(token.text, true);
        }
        if (!expectOperand && POSTFIX_OPERATORS.has(token.text)) {
            return unary(token.text, false);
        }

        const precedence = BINARY_PRECEDENCE.get(token.text);
        if (precedence !== undefined) {
            return {
                type: "operator",
                symbol: token.text,
                arity: 2,
                prefix: false,
                precedence,
                token,
            };
        }

        if (PREFIX_OPERATORS.has(token.text)) throw this.missingOperator(token);

        throw this.error(
            "expected-token",
            `Unexpected operator '${token.text}' in expression`,
            token,
            "operator",
            isAssignmentOperator(token.text)
                ? "Assignments are statements and cannot appear inside expressions"
                : undefined,
        );
    }

    private reduce(operator: PendingOperator, operands: Operand[]): void {
        if (operator.arity === 1) {
            const operand = operands.pop();
            if (!operand) throw this.missingOperand(operator);

            const loc = operator.prefix
                ? this.getLoc(operator.token)
                : operand.loc;
            operands.push(new OperatorNode(operator.symbol, [operand], loc));
            return;
        }

        const right = operands.pop();
        const left = operands.pop();
        if (!left || !right) throw this.missingOperand(operator);

        operands.push(new OperatorNode(operator.symbol, [left, right], left.loc));
    }

    private missingOperator(token: Token): ParseError {
        return this.error(
            "malformed-expression",
            `Malformed expression: missing operator before ${describeToken(token)}`,
            token,
            "operator",
        );
    }

    private missingOperand(operator: PendingOperator): ParseError {
        return this.error(
            "missing-operand",
            `Missing operand for operator '${operator.token.text}'`,
            operator.token,
            "operand",
        );
    }

    private operand(): Operand {
        const token = this.peek();
        const loc = this.getLoc(token);

        switch (token.kind) {
            case TokenKind.Identifier:
                this.advance();
                return new Identifier(token.text, loc);
            case TokenKind.IntLiteral:
                this.advance();
                return new IntLiteral(token.text, loc);
            case TokenKind.FloatLiteral:
                this.advance();
                return new FloatLiteral(token.text, loc);
            case TokenKind.BoolLiteral:
                this.advance();
                return new BoolLiteral(token.text, loc);
            default:
                throw this.unexpected("operand", "Expected operand in expression");
        }
    }

    private match(kind: TokenKind, text?: string): boolean {
        if (this.check(kind, text)) {
            this.advance();
            return true;
        }
        return false;
    }

    private consume(kind: TokenKind, text: string | null, message: string): Token {
        if (this.check(kind, text ?? undefined)) return this.advance();
        throw this.unexpected(text ? `'${text}'` : KIND_NAMES[kind], message);
    }

    private check(kind: TokenKind, text?: string): boolean {
        const token = this.peek();
        return token.kind === kind && (text === undefined || token.text === text);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().kind === TokenKind.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        if (this.current + 1 >= this.tokens.length) {
            return this.tokens[this.tokens.length - 1];
        }
        return this.tokens[this.current + 1];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    /**
     * The error for finding the current token where `expected` should be.
     * Error tokens report their own lexical problem instead.
     */
    private unexpected(expected: string, message: string): ParseError {
        const token = this.peek();

        if (token.kind === TokenKind.Error) {
            return this.error(
                token.error ?? "invalid-token",
                `Lexical error: ${token.text}`,
                token,
                expected,
            );
        }

        const code: ParseErrorCode =
            token.kind === TokenKind.EOF
                ? "unexpected-end-of-input"
                : "expected-token";
        return this.error(
            code,
            `${message}, found ${describeToken(token)}`,
            token,
            expected,
        );
    }

    private error(
        code: ParseErrorCode,
        message: string,
        token: Token,
        expected?: string,
        hint?: string,
    ): ParseError {
        const loc: ErrorLocation = {
            ...this.getLoc(token),
            len: token.kind === TokenKind.Error ? 1 : token.text.length,
        };
        return new ParseError(code, message, loc, {
            expected,
            actual: token,
            source: this.source,
            hint,
        });
    }
}
