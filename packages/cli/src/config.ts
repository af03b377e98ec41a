import { promises as fs } from "fs";
import * as path from "path";
import yaml from "js-yaml";
import {
    CompilerPaths,
    ConfigError,
    PATH_KEYS,
    parseConfig,
    resolvePaths,
} from "@tinyc/core";

export const CONFIG_FILE_NAMES = ["tinyc.yml", "tinyc.yaml"];

export interface PathOverrides {
    config?: string;
    source?: string;
    tokens?: string;
    tree?: string;
}

export interface ResolvedConfig {
    paths: CompilerPaths;
    /** The configuration file that was applied, if any. */
    configFile: string | null;
}

async function exists(file: string): Promise<boolean> {
    return fs.access(file).then(
        () => true,
        () => false,
    );
}

/**
 * Looks for a configuration file in `startDir` and then in each parent
 * directory up to the filesystem root.
 */
export async function findConfigFile(startDir: string): Promise<string | null> {
    let currentDir = path.resolve(startDir);

    for (;;) {
        for (const name of CONFIG_FILE_NAMES) {
            const candidate = path.join(currentDir, name);
            if (await exists(candidate)) return candidate;
        }

        const parent = path.dirname(currentDir);
        if (parent === currentDir) return null;
        currentDir = parent;
    }
}

/**
 * Reads and validates a YAML configuration file. Relative paths in it are
 * taken relative to the file's own directory.
 */
export async function loadConfigFile(
    file: string,
): Promise<Partial<CompilerPaths>> {
    let content: string;
    try {
        content = await fs.readFile(file, "utf-8");
    } catch (e) {
        throw new ConfigError(
            `Can't read configuration file ${file}`,
            e instanceof Error ? e.message : undefined,
        );
    }

    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (e) {
        throw new ConfigError(
            `Invalid YAML in ${file}`,
            e instanceof Error ? e.message : undefined,
        );
    }

    const config = parseConfig(raw, file);
    const baseDir = path.dirname(file);
    const resolved: Partial<CompilerPaths> = {};
    for (const key of PATH_KEYS) {
        const value = config[key];
        if (value !== undefined) resolved[key] = path.resolve(baseDir, value);
    }
    return resolved;
}

/**
 * Defaults, then the configuration file (explicit or discovered), then the
 * command-line flags. Everything not already absolute is resolved against
 * `cwd`.
 */
export async function resolveCliPaths(
    overrides: PathOverrides,
    cwd: string = process.cwd(),
): Promise<ResolvedConfig> {
    const configFile = overrides.config
        ? path.resolve(cwd, overrides.config)
        : await findConfigFile(cwd);
    const fromFile = configFile ? await loadConfigFile(configFile) : {};

    const merged = resolvePaths(fromFile, {
        source: overrides.source,
        tokens: overrides.tokens,
        tree: overrides.tree,
    });

    return {
        paths: {
            source: path.resolve(cwd, merged.source),
            tokens: path.resolve(cwd, merged.tokens),
            tree: path.resolve(cwd, merged.tree),
        },
        configFile,
    };
}
