// tests/logging.test.ts
import { describe, expect, it, vi } from 'vitest';

import { getFunctionalLogger, getLogger, LoggerNames, NoopLogFacility } from '../src/utils/logging/logUtils.ts';
import { scale } from '../src/core/functional/geometry.ts';
import { ObjectImage } from '../src/core/image/ObjectImage.ts';
import { resolveInterpolation, InterpolationMode } from '../src/core/interpolation/interpolationModes.ts';
import { ValidationError } from '../src/utils/errors/transformErrors.ts';
import { MockLogger } from './helpers/mockLogger.ts';

describe('logging', () => {
    it('should write level-tagged lines and keep the messages', () => {
        const facility = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const logger = getLogger('log-test', facility, false);

        logger.info('started');
        logger.warn('careful');
        logger.error('broken');
        logger.success('done');
        logger.debug('details');

        expect(facility.log).toHaveBeenCalledWith(expect.stringContaining('[INFO] log-test :: started'));
        expect(facility.warn).toHaveBeenCalledWith(expect.stringContaining('[WARNING] log-test :: careful'));
        expect(facility.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] log-test :: broken'));
        expect(facility.log).toHaveBeenCalledTimes(2);
        expect(logger.infoMessages).toEqual(['started']);
        expect(logger.warnMessages).toEqual(['careful']);
        expect(logger.errorMessages).toEqual(['broken']);
        expect(logger.successMessages).toEqual(['done']);
        expect(logger.debugMessages).toEqual(['details']);
    });

    it('should only print debug lines when verbose', () => {
        const facility = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
        getLogger('verbose-test', facility, true).debug('details');
        expect(facility.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] verbose-test :: details'));
    });

    it('should return the cached logger for a known name', () => {
        const first = getLogger('cached-test', NoopLogFacility);
        expect(getLogger('cached-test')).toBe(first);
    });

    it('should report deprecated calls on the functional logger', () => {
        const functional = getLogger(LoggerNames.Functional, NoopLogFacility);
        expect(getFunctionalLogger()).toBe(functional);

        scale(ObjectImage.create('L', 2, 2), 4);
        expect(functional.warnMessages).toEqual(['The use of scale is deprecated, please use resize instead.']);
    });
});

describe('resolveInterpolation', () => {
    it('should pass modes through silently', () => {
        const logger = new MockLogger();
        expect(resolveInterpolation(InterpolationMode.Bicubic, logger)).toBe(InterpolationMode.Bicubic);
        expect(logger.warnMessages).toEqual([]);
    });

    it('should map every legacy code with a warning', () => {
        const logger = new MockLogger();
        const modes = [0, 1, 2, 3, 4, 5].map((code) => resolveInterpolation(code, logger));
        expect(modes).toEqual([
            InterpolationMode.Nearest,
            InterpolationMode.Lanczos,
            InterpolationMode.Bilinear,
            InterpolationMode.Bicubic,
            InterpolationMode.Box,
            InterpolationMode.Hamming,
        ]);
        expect(logger.warnMessages).toHaveLength(6);
        expect(logger.warnMessages[0]).toBe(
            'Argument interpolation should be of type InterpolationMode instead of int (got 0, using "nearest").',
        );
    });

    it('should reject unknown codes', () => {
        const logger = new MockLogger();
        expect(() => resolveInterpolation(1.5, logger)).toThrow(ValidationError);
        expect(() => resolveInterpolation(-1, logger)).toThrow('Unknown legacy interpolation code -1.');
    });
});
