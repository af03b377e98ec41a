#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { compileCommand } from "./commands/compile";
import { lexCommand } from "./commands/lex";
import { parseCommand } from "./commands/parse";

yargs(hideBin(process.argv))
    .scriptName("tinyc")
    .usage("$0 [cmd] [options]")
    .command(compileCommand)
    .command(lexCommand)
    .command(parseCommand)
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(chalk.red(e instanceof Error ? e.message : String(e)));
        process.exitCode = 1;
    });
