import type { CommandModule } from "yargs";
import { compileFile } from "../pipeline";
import { PathArgs, createHandler, withPathOptions } from "./options";

export const compileCommand: CommandModule<{}, PathArgs> = {
    command: ["compile", "$0"],
    describe: "Lex and parse the source file, writing both dumps",
    builder: withPathOptions,
    handler: createHandler(compileFile),
};
