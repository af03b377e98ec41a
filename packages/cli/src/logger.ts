import chalk from "chalk";

export interface Logger {
    success(message: string): void;
    warn(message: string): void;
    /** Printed only in verbose mode. */
    debug(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const verbose = options.verbose ?? false;

    return {
        success: (message) => console.log(chalk.green(message)),
        warn: (message) => console.warn(chalk.yellow(message)),
        debug: (message) => {
            if (verbose) console.log(chalk.gray(message));
        },
        // Diagnostics arrive already coloured
        error: (message) => console.error(message),
    };
}
