import type { CommandModule } from "yargs";
import { parseFile } from "../pipeline";
import { PathArgs, createHandler, withPathOptions } from "./options";

export const parseCommand: CommandModule<{}, PathArgs> = {
    command: "parse",
    describe: "Parse a token dump into a syntax tree dump",
    builder: withPathOptions,
    handler: createHandler(parseFile),
};
