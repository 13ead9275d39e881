// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

const loggerMap: Record<string, ILogger> = {};

/** Names of the loggers the engine and its CLI write to. */
export const LoggerNames = Object.freeze({
    Functional: 'functional',
    Apply: 'apply',
    Batch: 'batch',
} as const);

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Logger writing coloured, level-tagged lines to a log facility. Every message is also kept
 * per level so callers can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.logger.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
        this.infoMessages.push(message);
    }

    success(message: string) {
        this.logger.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
        this.successMessages.push(message);
    }

    warn(message: string) {
        this.logger.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.logger.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logger.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one.
 *
 * @param {string} name - The name identifier for the logger.
 * @param {ILogFacility} logFacility - Where the lines are written; only used when the logger is created.
 * @param {boolean} verbose - Whether debug lines are written as well.
 * @return {ILogger} The logger registered under `name`.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const logger = loggerMap[name];
    if (!logger) {
        loggerMap[name] = new Logger(name, logFacility, verbose);
    }
    return loggerMap[name];
}

/**
 * Logger shared by the functional primitives. Deprecated calls and legacy interpolation codes are
 * reported on it, so callers can silence or inspect them by configuring this one name.
 *
 * @return {ILogger} The cached `functional` logger.
 */
export function getFunctionalLogger(): ILogger {
    return getLogger(LoggerNames.Functional);
}
