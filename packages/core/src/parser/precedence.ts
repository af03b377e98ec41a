/**
 * Binding strength of the binary operators, low to high. Bitwise operators
 * sit where C puts them, so the table uses a wider scale than the six
 * language levels (||, &&, relational, additive, multiplicative, unary).
 */
export const BINARY_PRECEDENCE: ReadonlyMap<string, number> = new Map([
    ["||", 10],
    ["&&", 20],
    ["|", 23],
    ["^", 24],
    ["&", 25],
    ["==", 30],
    ["!=", 30],
    ["<", 30],
    ["<=", 30],
    [">", 30],
    [">=", 30],
    ["<<", 35],
    [">>", 35],
    ["+", 40],
    ["-", 40],
    ["*", 50],
    ["/", 50],
    ["%", 50],
]);

export const UNARY_PRECEDENCE = 60;

/** Operators allowed before an operand. `-` becomes `neg` there. */
export const PREFIX_OPERATORS: ReadonlySet<string> = new Set([
    "!",
    "~",
    "++",
    "--",
]);

export const POSTFIX_OPERATORS: ReadonlySet<string> = new Set(["++", "--"]);

export const NEGATION = "neg";

/** A reduced root built from one of these makes a boolean expression. */
export const BOOLEAN_OPERATORS: ReadonlySet<string> = new Set([
    "||",
    "&&",
    "==",
    "!=",
    "<",
    "<=",
    ">",
    ">=",
    "!",
]);
