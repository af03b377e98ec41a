import type { CommandModule } from "yargs";
import { lexFile } from "../pipeline";
import { PathArgs, createHandler, withPathOptions } from "./options";

export const lexCommand: CommandModule<{}, PathArgs> = {
    command: "lex",
    describe: "Tokenize the source file into a token dump",
    builder: withPathOptions,
    handler: createHandler(lexFile),
};
