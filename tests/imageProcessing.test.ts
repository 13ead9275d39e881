// tests/imageProcessing.test.ts
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { loadImage, writeImage } from '../src/core/imageProcessing/processor.ts';
import { applyToFile, listImageFiles, processBatch } from '../src/core/runner/transformRunner.ts';
import { Compose } from '../src/core/transforms/Compose.ts';
import { Lambda } from '../src/core/transforms/Lambda.ts';
import { hflip } from '../src/core/functional/geometry.ts';
import { ArrayImage } from '../src/core/image/ArrayImage.ts';
import { ObjectImage } from '../src/core/image/ObjectImage.ts';
import { MockLogger } from './helpers/mockLogger.ts';
import { randomObjectImage, rawBytes } from './helpers/images.ts';

describe('image files', () => {
    let workDir: string;

    beforeAll(async () => {
        workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'frame-transforms-'));
    });

    afterAll(async () => {
        await fs.rm(workDir, { recursive: true, force: true });
    });

    describe('loadImage / writeImage', () => {
        it('should round-trip RGB and RGBA images through PNG', async () => {
            for (const mode of ['RGB', 'RGBA'] as const) {
                const image = randomObjectImage(mode, 6, 4, `png-${mode}`);
                const file = path.join(workDir, `roundtrip-${mode}.png`);
                await writeImage(image, file);
                const loaded = await loadImage(file);
                expect(loaded.mode).toBe(mode);
                expect(loaded.size).toEqual([6, 4]);
                expect(rawBytes(loaded)).toEqual(rawBytes(image));
            }
        });

        it('should convert array images before writing', async () => {
            const file = path.join(workDir, 'array.png');
            await writeImage(ArrayImage.fromValues([1, 0, 0, 0.5, 0, 0], [3, 1, 2]), file);
            const loaded = await loadImage(file);
            expect(loaded.getPixel(0, 0)).toEqual([255, 0, 0]);
            expect(loaded.getPixel(1, 0)).toEqual([0, 127, 0]);
        });
    });

    describe('transform runner', () => {
        let inputFolder: string;

        beforeAll(async () => {
            inputFolder = path.join(workDir, 'input');
            await fs.mkdir(inputFolder, { recursive: true });
            await writeImage(ObjectImage.fromRaw([1, 2, 3, 4, 5, 6], 2, 1, 'RGB'), path.join(inputFolder, 'a.png'));
            await writeImage(ObjectImage.create('RGB', 3, 2, [9, 9, 9]), path.join(inputFolder, 'b.png'));
            await fs.writeFile(path.join(inputFolder, 'broken.png'), 'not a png');
            await fs.writeFile(path.join(inputFolder, 'notes.txt'), 'ignored');
        });

        it('should list image files by extension', async () => {
            expect(await listImageFiles(inputFolder)).toEqual(['a.png', 'b.png', 'broken.png']);
        });

        it('should transform a single file', async () => {
            const logger = new MockLogger();
            const outputFile = path.join(workDir, 'single', 'a-flipped.png');
            await applyToFile({
                inputFile: path.join(inputFolder, 'a.png'),
                outputFile,
                transform: new Lambda((image) => hflip(image)),
                logger,
            });
            expect(rawBytes(await loadImage(outputFile))).toEqual([4, 5, 6, 1, 2, 3]);
            expect(logger.infoMessages).toEqual([`Wrote 2x1 image to "${outputFile}".`]);
        });

        it('should process a folder and report failing files', async () => {
            const logger = new MockLogger();
            const progressBar = { start: vi.fn(), increment: vi.fn(), stop: vi.fn() };
            const outputFolder = path.join(workDir, 'output');

            const report = await processBatch({
                inputFolder,
                outputFolder,
                transform: new Compose([new Lambda((image) => hflip(image))]),
                concurrency: 2,
                logger,
                progressBar,
            });

            expect(report.map(({ file, status }) => [file, status])).toEqual([
                ['a.png', 'success'],
                ['b.png', 'success'],
                ['broken.png', 'failed'],
            ]);
            expect(logger.errorMessages).toHaveLength(1);
            expect(logger.errorMessages[0]).toMatch(/^Failed to process "broken\.png": /);
            expect(logger.warnMessages).toEqual(['Processed 3 files, 1 failed.']);
            expect(progressBar.start).toHaveBeenCalledWith(3, 0);
            expect(progressBar.increment).toHaveBeenCalledTimes(3);
            expect(progressBar.increment).toHaveBeenCalledWith(1, { file: 'broken.png' });
            expect(progressBar.stop).toHaveBeenCalledTimes(1);
            expect((await fs.readdir(outputFolder)).sort()).toEqual(['a.png', 'b.png']);
            expect(rawBytes(await loadImage(path.join(outputFolder, 'a.png')))).toEqual([4, 5, 6, 1, 2, 3]);
        });
    });
});
