import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { log, LogLevel, SetLogThreshold } from '../src/Common/Log.js';
import { FIXED_TIME } from './helpers.js';

describe('log', () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date(FIXED_TIME));
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
        SetLogThreshold(LogLevel.Critical);
    });

    it('should prefix timestamp, source and context', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        SetLogThreshold('info');

        log.warning('Record file was already missing', 'ProjectStore', 'Delete');
        log.warning('No context here', 'ProjectStore');

        expect(warn.mock.calls).toEqual([
            [`[${FIXED_TIME}] [ProjectStore] [Delete] Record file was already missing`],
            [`[${FIXED_TIME}] [ProjectStore] No context here`],
        ]);
    });

    it('should drop messages below the threshold', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        SetLogThreshold('warn');

        log.debug('hidden', 'Test');
        log.info('hidden', 'Test');
        log.critical('shown', 'Test');

        expect(debug).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(1);
    });
});
