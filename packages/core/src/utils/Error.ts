import chalk from "chalk";
import { LexErrorCode, Token, describeToken } from "../types/token";

export interface ErrorLocation {
    line: number;
    column: number;
    len?: number;
}

/**
 * Renders a diagnostic. With the source at hand the offending line is shown
 * with a caret under the location; without it only `line:col` is printed.
 * Line 0 means the position is unknown (e.g. tokens read from a dump without
 * positions).
 */
export function formatDiagnostic(
    message: string,
    loc?: ErrorLocation,
    source?: string,
    hint?: string,
): string {
    const errorHeader = `${chalk.red.bold("Error:")} ${chalk.bold(message)}`;
    if (!loc || loc.line < 1) {
        return hint ? `${errorHeader}\n  = ${hint}` : errorHeader;
    }

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);
    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.column}`;
    const output = [errorHeader, locationLine];

    if (source !== undefined) {
        const lineContent = source.split("\n")[loc.line - 1] ?? "";
        const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
        const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

        const pointerSpace = " ".repeat(Math.max(0, loc.column - 1));
        const pointer = chalk.red.bold("^".repeat(Math.max(1, loc.len ?? 1)));
        const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

        output.push(pipeLine, codeLine, pointerLine, pipeLine);
    }

    if (hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${hint}`);
    }

    return "\n" + output.join("\n");
}

export class TinycError extends Error {
    public rawMessage: string;
    public loc?: ErrorLocation;
    public source?: string;
    public hint?: string;

    constructor(
        message: string,
        loc?: ErrorLocation,
        source?: string,
        hint?: string,
    ) {
        super(formatDiagnostic(message, loc, source, hint));
        this.name = "TinycError";
        this.rawMessage = message;
        this.loc = loc;
        this.source = source;
        this.hint = hint;
    }
}

export type ParseErrorCode =
    | "expected-token"
    | "unmatched-parenthesis"
    | "missing-operand"
    | "empty-expression"
    | "malformed-expression"
    | "unexpected-end-of-input"
    | "nesting-too-deep"
    // An error token reached the parser without a recognisable code
    | "invalid-token"
    | LexErrorCode;

export interface ParseErrorDetails {
    /** What the parser was looking for, e.g. `';'` or `statement`. */
    expected?: string;
    /** The token it found instead. */
    actual?: Token;
    source?: string;
    hint?: string;
}

export class ParseError extends TinycError {
    public code: ParseErrorCode;
    public expected?: string;
    public actual?: Token;

    constructor(
        code: ParseErrorCode,
        message: string,
        loc: ErrorLocation,
        details: ParseErrorDetails = {},
    ) {
        super(message, loc, details.source, details.hint);
        this.name = "ParseError";
        this.code = code;
        this.expected = details.expected;
        this.actual = details.actual;
    }

    /** The failing token as it reads in a message: `'x'` or `end of input`. */
    get found(): string | undefined {
        return this.actual ? describeToken(this.actual) : undefined;
    }
}

export class ConfigError extends TinycError {
    constructor(message: string, hint?: string) {
        super(message, undefined, undefined, hint);
        this.name = "ConfigError";
    }
}
