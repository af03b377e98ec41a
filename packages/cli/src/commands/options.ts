import chalk from "chalk";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { CompilerPaths, TinycError } from "@tinyc/core";
import { resolveCliPaths } from "../config";
import { Logger, createLogger } from "../logger";

export interface PathArgs {
    config: string | undefined;
    source: string | undefined;
    tokens: string | undefined;
    tree: string | undefined;
    verbose: boolean;
}

export type Task = (paths: CompilerPaths, logger: Logger) => Promise<unknown>;

export function withPathOptions(yargs: Argv<{}>): Argv<PathArgs> {
    return yargs
        .option("config", {
            alias: "c",
            describe: "Path to a tinyc.yml configuration file",
            type: "string",
        })
        .option("source", {
            alias: "s",
            describe: "Source file to compile",
            type: "string",
        })
        .option("tokens", {
            alias: "t",
            describe: "Token dump file",
            type: "string",
        })
        .option("tree", {
            alias: "o",
            describe: "Syntax tree dump file",
            type: "string",
        })
        .option("verbose", {
            alias: "v",
            describe: "Print every token and resolved path",
            type: "boolean",
            default: false,
        });
}

export function reportFailure(error: unknown, logger: Logger): void {
    if (error instanceof TinycError) {
        logger.error(error.message);
        return;
    }
    const detail =
        error instanceof Error ? (error.stack ?? error.message) : String(error);
    logger.error(chalk.red(`Unexpected failure: ${detail}`));
}

/**
 * Resolves the paths for a command and runs its task. Returns the process
 * exit code.
 */
export async function executeCommand(
    args: PathArgs,
    task: Task,
    logger: Logger,
    cwd: string = process.cwd(),
): Promise<number> {
    try {
        const { paths, configFile } = await resolveCliPaths(args, cwd);
        if (configFile) logger.debug(`Using configuration from ${configFile}`);
        logger.debug(
            `source=${paths.source} tokens=${paths.tokens} tree=${paths.tree}`,
        );
        await task(paths, logger);
        return 0;
    } catch (e) {
        reportFailure(e, logger);
        return 1;
    }
}

export function createHandler(task: Task) {
    return async (argv: ArgumentsCamelCase<PathArgs>): Promise<void> => {
        const logger = createLogger({ verbose: argv.verbose });
        process.exitCode = await executeCommand(argv, task, logger);
    };
}
