import { ConfigError } from "../utils/Error";

/** File locations used by the compiler driver. */
export interface CompilerPaths {
    /** Program source text. */
    source: string;
    /** Token dump written by the lexer and read by the parser. */
    tokens: string;
    /** Indented parse-tree dump. */
    tree: string;
}

export const DEFAULT_PATHS: Readonly<CompilerPaths> = {
    source: "source.txt",
    tokens: "lex_out.txt",
    tree: "parse_out.txt",
};

export const PATH_KEYS: readonly (keyof CompilerPaths)[] = ["source", "tokens", "tree"];

function isPathKey(key: string): key is keyof CompilerPaths {
    const keys: readonly string[] = PATH_KEYS;
    return keys.includes(key);
}

/**
 * Validates a loaded configuration document. An empty document is an empty
 * configuration; anything other than a mapping of the three path keys to
 * strings is rejected.
 */
export function parseConfig(raw: unknown, origin = "configuration"): Partial<CompilerPaths> {
    if (raw === null || raw === undefined) return {};

    if (typeof raw !== "object" || Array.isArray(raw)) {
        throw new ConfigError(
            `${origin} must be a mapping`,
            `Valid keys: ${PATH_KEYS.join(", ")}`,
        );
    }

    const config: Partial<CompilerPaths> = {};
    const entries: [string, unknown][] = Object.entries(raw);
    for (const [key, value] of entries) {
        if (!isPathKey(key)) {
            throw new ConfigError(
                `Unknown key '${key}' in ${origin}`,
                `Valid keys: ${PATH_KEYS.join(", ")}`,
            );
        }
        if (typeof value !== "string" || value.trim() === "") {
            throw new ConfigError(
                `'${key}' in ${origin} must be a non-empty string`,
            );
        }
        config[key] = value;
    }
    return config;
}

/**
 * Merges configuration layers over the defaults; later layers win and
 * undefined entries are ignored.
 */
export function resolvePaths(...layers: Partial<CompilerPaths>[]): CompilerPaths {
    const paths: CompilerPaths = { ...DEFAULT_PATHS };
    for (const layer of layers) {
        for (const key of PATH_KEYS) {
            const value = layer[key];
            if (value !== undefined) paths[key] = value;
        }
    }
    return paths;
}
