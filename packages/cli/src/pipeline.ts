import { promises as fs } from "fs";
import * as path from "path";
import {
    CompilerPaths,
    Lexer,
    Parser,
    Program,
    TinycError,
    Token,
    TokenKind,
    decodeTokens,
    encodeTokens,
    serializeTree,
} from "@tinyc/core";
import { Logger } from "./logger";

export interface LexResult {
    source: string;
    tokens: Token[];
}

async function readText(file: string, what: string): Promise<string> {
    try {
        return await fs.readFile(file, "utf-8");
    } catch (e) {
        throw new TinycError(
            `Can't open ${what} file: ${file}`,
            undefined,
            undefined,
            e instanceof Error ? e.message : undefined,
        );
    }
}

async function writeText(file: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, "utf-8");
}

function logTokens(tokens: readonly Token[], logger: Logger): void {
    for (const token of tokens) {
        if (token.kind === TokenKind.EOF) continue;
        logger.debug(
            `${token.line}:${token.column} ${token.kind} ${token.text}`,
        );
    }
}

/**
 * Source file to token dump. Lexical errors do not stop this step; they are
 * written into the dump like any other token.
 */
export async function lexFile(
    paths: CompilerPaths,
    logger: Logger,
): Promise<LexResult> {
    const source = await readText(paths.source, "source");
    const tokens = new Lexer(source).tokenize();

    logTokens(tokens, logger);
    for (const token of tokens) {
        if (token.kind === TokenKind.Error) {
            logger.warn(
                `${paths.source}:${token.line}:${token.column} ${token.text}`,
            );
        }
    }

    await writeText(paths.tokens, encodeTokens(tokens));
    logger.success(`Lexed ${tokens.length - 1} tokens into ${paths.tokens}`);

    return { source, tokens };
}

async function writeTree(
    tree: Program,
    paths: CompilerPaths,
    logger: Logger,
): Promise<void> {
    await writeText(paths.tree, serializeTree(tree));
    logger.success(`Parse succeeded, tree written to ${paths.tree}`);
}

/** Token dump to tree dump. */
export async function parseFile(
    paths: CompilerPaths,
    logger: Logger,
): Promise<Program> {
    const dump = await readText(paths.tokens, "token");
    const tokens = decodeTokens(dump);
    logger.debug(`Read ${tokens.length - 1} tokens from ${paths.tokens}`);
    logTokens(tokens, logger);

    const tree = new Parser(tokens).parse();
    await writeTree(tree, paths, logger);
    return tree;
}

/**
 * Both steps. The parser works on the in-memory tokens and has the source
 * text, so diagnostics can quote the offending line.
 */
export async function compileFile(
    paths: CompilerPaths,
    logger: Logger,
): Promise<Program> {
    const { source, tokens } = await lexFile(paths, logger);

    const tree = new Parser(tokens, source).parse();
    await writeTree(tree, paths, logger);
    return tree;
}
