// src/cli/index.ts

import path from 'node:path';
import { Command } from 'commander';
import cliProgress from 'cli-progress';
import { getLogger, LoggerNames } from '../utils/logging/logUtils.ts';
import { config } from '../config/index.ts';
import { applyToFile, processBatch } from '../core/runner/transformRunner.ts';
import { addTransformOptions, buildPipeline, parseNumber, type TransformCliOptions } from './pipelineOptions.ts';

interface ApplyCommandOptions extends TransformCliOptions {
    input: string;
    output: string;
    verbose?: boolean;
}

interface BatchCommandOptions extends ApplyCommandOptions {
    concurrency?: number;
}

const program = new Command();
program
    .name('frame-transforms')
    .description('Apply geometric and photometric transforms to images')
    .version('1.0.0');

addTransformOptions(
    program
        .command('apply')
        .description('Transform a single image and write it as PNG')
        .requiredOption('-i, --input <file>', 'Input image file')
        .requiredOption('-o, --output <file>', 'Output PNG file')
        .option('-v, --verbose', 'Enable verbose logging'),
)
    .showHelpAfterError()
    .action(async (options: ApplyCommandOptions) => {
        const logger = getLogger(LoggerNames.Apply, console, options.verbose ?? false);
        try {
            await applyToFile({
                inputFile: path.resolve(options.input),
                outputFile: path.resolve(options.output),
                transform: buildPipeline(options),
                logger,
            });
        } catch (error) {
            logger.error(`Transform failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    });

addTransformOptions(
    program
        .command('batch')
        .description('Transform every image of a folder into PNG files')
        .requiredOption('-i, --input <folder>', 'Folder with input images')
        .requiredOption('-o, --output <folder>', 'Output folder')
        .option('-c, --concurrency <number>', `Files processed at once (Default: ${config.batch.concurrency})`, parseNumber)
        .option('-v, --verbose', 'Enable verbose logging'),
)
    .showHelpAfterError()
    .action(async (options: BatchCommandOptions) => {
        const verbose = options.verbose ?? false;
        const logger = getLogger(LoggerNames.Batch, console, verbose);
        const concurrency = options.concurrency ?? config.batch.concurrency;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            logger.error(`Concurrency must be a positive integer, got ${concurrency}.`);
            process.exitCode = 1;
            return;
        }

        const progressBar = verbose
            ? undefined
            : new cliProgress.SingleBar(
                  {
                      format: 'Processing |{bar}| {percentage}% || {value}/{total} Files',
                      barCompleteChar: '█',
                      barIncompleteChar: '░',
                      hideCursor: true,
                  },
                  cliProgress.Presets.shades_grey,
              );
        try {
            const report = await processBatch({
                inputFolder: path.resolve(options.input),
                outputFolder: path.resolve(options.output),
                transform: buildPipeline(options),
                concurrency,
                logger,
                progressBar,
            });
            if (report.some((entry) => entry.status === 'failed')) {
                process.exitCode = 1;
            }
        } catch (error) {
            progressBar?.stop();
            logger.error(`Batch failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    });

await program.parseAsync(process.argv);
