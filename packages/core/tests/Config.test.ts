import {
    DEFAULT_PATHS,
    parseConfig,
    resolvePaths,
} from "../src/config/Config";
import { ConfigError } from "../src/utils/Error";

function configFailure(raw: unknown): ConfigError {
    try {
        parseConfig(raw, "tinyc.yml");
    } catch (e) {
        if (e instanceof ConfigError) return e;
        throw e;
    }
    throw new Error("expected the configuration to be rejected");
}

describe("Config", () => {
    test("empty document is an empty configuration", () => {
        expect(parseConfig(null)).toEqual({});
        expect(parseConfig(undefined)).toEqual({});
    });

    test("accept the path keys", () => {
        expect(parseConfig({ source: "main.tc", tree: "out/tree.txt" })).toEqual(
            { source: "main.tc", tree: "out/tree.txt" },
        );
    });

    test("reject anything but a mapping", () => {
        expect(configFailure(["source"]).rawMessage).toBe(
            "tinyc.yml must be a mapping",
        );
        expect(configFailure("source.txt").rawMessage).toBe(
            "tinyc.yml must be a mapping",
        );
    });

    test("reject unknown keys", () => {
        const error = configFailure({ output: "a.txt" });

        expect(error.rawMessage).toBe("Unknown key 'output' in tinyc.yml");
        expect(error.hint).toBe("Valid keys: source, tokens, tree");
    });

    test("reject empty and non-string values", () => {
        expect(configFailure({ tokens: " " }).rawMessage).toBe(
            "'tokens' in tinyc.yml must be a non-empty string",
        );
        expect(configFailure({ tokens: 3 }).rawMessage).toBe(
            "'tokens' in tinyc.yml must be a non-empty string",
        );
    });

    test("later layers win over defaults", () => {
        expect(resolvePaths()).toEqual(DEFAULT_PATHS);
        expect(
            resolvePaths(
                { source: "a.tc", tokens: "a.lex" },
                { source: "b.tc", tokens: undefined },
            ),
        ).toEqual({ source: "b.tc", tokens: "a.lex", tree: "parse_out.txt" });
    });
});
