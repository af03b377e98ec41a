export const TYPE_KEYWORDS: ReadonlySet<string> = new Set(["int", "float", "bool"]);

export const KEYWORDS: ReadonlySet<string> = new Set([
    ...TYPE_KEYWORDS,
    "if",
    "else",
    "while",
    "for",
    "read",
    "write",
]);

export const BOOLEAN_LITERALS: ReadonlySet<string> = new Set(["true", "false"]);

export const OPERATORS: ReadonlySet<string> = new Set([
    // Arithmetic
    "+",
    "-",
    "*",
    "/",
    "%",
    "++",
    "--",

    // Assignment
    "=",
    "+=",
    "-=",
    "*=",
    "/=",

    // Relational & logical
    "==",
    "!=",
    "<",
    "<=",
    ">",
    ">=",
    "&&",
    "||",
    "!",

    // Bitwise
    "&",
    "|",
    "^",
    "~",
    "<<",
    ">>",
]);

export const SEPARATORS: ReadonlySet<string> = new Set([
    ";",
    ",",
    "(",
    ")",
    "{",
    "}",
    "[",
    "]",
    ":",
]);
