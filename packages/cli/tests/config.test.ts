import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigError } from "@tinyc/core";
import { findConfigFile, resolveCliPaths } from "../src/config";

describe("CLI configuration", () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "tinyc-config-"));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    async function configFailure(
        overrides: { config?: string },
        cwd: string,
    ): Promise<ConfigError> {
        try {
            await resolveCliPaths(overrides, cwd);
        } catch (e) {
            if (e instanceof ConfigError) return e;
            throw e;
        }
        throw new Error("expected the configuration to be rejected");
    }

    test("default paths resolve against the working directory", async () => {
        const resolved = await resolveCliPaths({}, root);

        expect(resolved).toEqual({
            paths: {
                source: path.join(root, "source.txt"),
                tokens: path.join(root, "lex_out.txt"),
                tree: path.join(root, "parse_out.txt"),
            },
            configFile: null,
        });
    });

    test("find the configuration in a parent directory", async () => {
        const nested = path.join(root, "a", "b");
        fs.mkdirSync(nested, { recursive: true });
        fs.writeFileSync(path.join(root, "tinyc.yaml"), "tree: out.txt\n");

        expect(await findConfigFile(nested)).toBe(
            path.join(root, "tinyc.yaml"),
        );
    });

    test("config paths are relative to the config file", async () => {
        const sub = path.join(root, "sub");
        fs.mkdirSync(sub);
        fs.writeFileSync(
            path.join(root, "tinyc.yml"),
            "source: src/main.tc\ntree: out/tree.txt\n",
        );

        const { paths, configFile } = await resolveCliPaths({}, sub);

        expect(configFile).toBe(path.join(root, "tinyc.yml"));
        expect(paths).toEqual({
            source: path.join(root, "src", "main.tc"),
            tokens: path.join(sub, "lex_out.txt"),
            tree: path.join(root, "out", "tree.txt"),
        });
    });

    test("flags override the config file", async () => {
        fs.writeFileSync(path.join(root, "tinyc.yml"), "source: main.tc\n");

        const { paths } = await resolveCliPaths(
            { source: "other.tc", tokens: "/abs/tokens.txt" },
            root,
        );

        expect(paths.source).toBe(path.join(root, "other.tc"));
        expect(paths.tokens).toBe("/abs/tokens.txt");
    });

    test("an explicit config file must exist", async () => {
        const error = await configFailure({ config: "missing.yml" }, root);

        expect(error.rawMessage).toBe(
            `Can't read configuration file ${path.join(root, "missing.yml")}`,
        );
    });

    test("reject invalid YAML", async () => {
        const file = path.join(root, "broken.yml");
        fs.writeFileSync(file, "source: [unclosed\n");

        const error = await configFailure({ config: "broken.yml" }, root);

        expect(error.rawMessage).toBe(`Invalid YAML in ${file}`);
    });

    test("reject unknown keys with the file name", async () => {
        const file = path.join(root, "tinyc.yml");
        fs.writeFileSync(file, "output: a.txt\n");

        const error = await configFailure({}, root);

        expect(error.rawMessage).toBe(`Unknown key 'output' in ${file}`);
    });

    test("an empty config file changes nothing", async () => {
        fs.writeFileSync(path.join(root, "tinyc.yml"), "# nothing yet\n");

        const { paths } = await resolveCliPaths({}, root);

        expect(paths.source).toBe(path.join(root, "source.txt"));
    });
});
