// src/core/runner/transformRunner.ts

import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import type { IApplyOptions, IBatchOptions, IBatchReportEntry } from '../../@types/index.ts';
import { loadImage, writeImage } from '../imageProcessing/processor.ts';
import { config } from '../../config/index.ts';

/**
 * Loads one file, runs the transform over it and writes the result as PNG.
 */
export async function applyToFile(options: IApplyOptions): Promise<void> {
    const { inputFile, outputFile, transform, logger } = options;
    logger.debug(`Loading "${inputFile}".`);
    const image = await loadImage(inputFile);
    logger.debug(`Loaded ${image.width}x${image.height} ${image.mode} image.`);

    const result = transform.apply(image);
    await fs.mkdir(path.dirname(outputFile), { recursive: true });
    await writeImage(result, outputFile);
    logger.info(`Wrote ${result.width}x${result.height} image to "${outputFile}".`);
}

/**
 * Lists the image files of a folder, by extension, in name order.
 */
export async function listImageFiles(folder: string, extensions: readonly string[] = config.batch.extensions): Promise<string[]> {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase()))
        .map((entry) => entry.name)
        .sort();
}

/**
 * Transforms every image of `inputFolder` into a PNG of the same base name in `outputFolder`,
 * running at most `concurrency` files at once. A failing file is reported and does not stop the
 * others.
 */
export async function processBatch(options: IBatchOptions): Promise<IBatchReportEntry[]> {
    const { inputFolder, outputFolder, transform, concurrency, logger, progressBar } = options;
    const files = await listImageFiles(inputFolder);
    logger.info(`Found ${files.length} image files in "${inputFolder}".`);
    await fs.mkdir(outputFolder, { recursive: true });

    const limit = pLimit(concurrency);
    progressBar?.start(files.length, 0);

    const report = await Promise.all(
        files.map((file) =>
            limit(async (): Promise<IBatchReportEntry> => {
                const outputFile = path.join(outputFolder, `${path.parse(file).name}.png`);
                try {
                    await applyToFile({ inputFile: path.join(inputFolder, file), outputFile, transform, logger });
                    return { file, status: 'success' };
                } catch (error) {
                    const reason = error instanceof Error ? error.message : String(error);
                    logger.error(`Failed to process "${file}": ${reason}`);
                    return { file, status: 'failed', reason };
                } finally {
                    progressBar?.increment(1, { file });
                }
            }),
        ),
    );

    progressBar?.stop();
    const failed = report.filter((entry) => entry.status === 'failed').length;
    if (failed === 0) {
        logger.success(`Processed ${report.length} files.`);
    } else {
        logger.warn(`Processed ${report.length} files, ${failed} failed.`);
    }
    return report;
}
