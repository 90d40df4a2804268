import type { MockInstance } from 'vitest';
import {
    createLogger,
    setLogLevel,
    resetLogLevel,
    createTimer,
    logger
} from '../../src/utils/logger.js';

describe('logger utilities', () => {
    let consoleSpy: MockInstance<Parameters<typeof console.error>, void>;
    const savedLevel = process.env.GRID_LOG_LEVEL;

    const firstLine = (call = 0): string => String(consoleSpy.mock.calls[call][0]);

    beforeEach(() => {
        resetLogLevel();
        consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        consoleSpy.mockRestore();
        if (savedLevel === undefined) {
            delete process.env.GRID_LOG_LEVEL;
        } else {
            process.env.GRID_LOG_LEVEL = savedLevel;
        }
        resetLogLevel();
    });

    describe('createLogger', () => {
        it('should prefix output with the module name', () => {
            setLogLevel('info');
            const log = createLogger('Pathfinding');
            log.info('Search started');

            expect(consoleSpy).toHaveBeenCalledTimes(1);
            expect(firstLine()).toContain('[Pathfinding] Search started');
        });

        it('should include the padded level tag', () => {
            setLogLevel('info');
            const log = createLogger('Test');

            log.info('Info message');
            log.warn('Warn message');
            log.error('Error message');

            expect(firstLine(0)).toContain('[INFO ]');
            expect(firstLine(1)).toContain('[WARN ]');
            expect(firstLine(2)).toContain('[ERROR]');
        });

        it('should start with an HH:mm:ss.SSS timestamp', () => {
            setLogLevel('info');
            createLogger('Test').info('Test');

            expect(firstLine()).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] /);
        });
    });

    describe('log levels', () => {
        it('should be silent under NODE_ENV=test by default', () => {
            delete process.env.GRID_LOG_LEVEL;
            const log = createLogger('Test');

            log.error('Error message');
            expect(consoleSpy).not.toHaveBeenCalled();
        });

        it('should read GRID_LOG_LEVEL from the environment', () => {
            process.env.GRID_LOG_LEVEL = 'WARN';
            const log = createLogger('Test');

            log.info('Info message');
            log.warn('Warn message');
            expect(consoleSpy).toHaveBeenCalledTimes(1);
        });

        it('should ignore an unknown GRID_LOG_LEVEL', () => {
            process.env.GRID_LOG_LEVEL = 'verbose';
            const log = createLogger('Test');

            expect(log.isEnabled('error')).toBe(false);
        });

        it('should respect info level', () => {
            setLogLevel('info');
            const log = createLogger('Test');

            log.debug('Debug message');
            expect(consoleSpy).not.toHaveBeenCalled();

            log.info('Info message');
            log.warn('Warn message');
            log.error('Error message');
            expect(consoleSpy).toHaveBeenCalledTimes(3);
        });

        it('should respect debug level', () => {
            setLogLevel('debug');
            createLogger('Test').debug('Debug message');

            expect(consoleSpy).toHaveBeenCalledTimes(1);
        });

        it('should respect silent level', () => {
            setLogLevel('silent');
            const log = createLogger('Test');

            log.debug('Debug');
            log.info('Info');
            log.warn('Warn');
            log.error('Error');

            expect(consoleSpy).not.toHaveBeenCalled();
        });
    });

    describe('child logger', () => {
        it('should join prefixes with a colon', () => {
            setLogLevel('info');
            const child = createLogger('GridMap').child('Buffer').child('Fov');

            child.info('Test');

            expect(firstLine()).toContain('[GridMap:Buffer:Fov]');
        });
    });

    describe('isEnabled', () => {
        it('should report enabled levels', () => {
            setLogLevel('warn');
            const log = createLogger('Test');

            expect(log.isEnabled('debug')).toBe(false);
            expect(log.isEnabled('info')).toBe(false);
            expect(log.isEnabled('warn')).toBe(true);
            expect(log.isEnabled('error')).toBe(true);
            expect(log.isEnabled('silent')).toBe(false);
        });
    });

    describe('createTimer', () => {
        it('should log elapsed milliseconds at debug level', async () => {
            setLogLevel('debug');
            const timer = createTimer(createLogger('Test'));

            await new Promise(resolve => setTimeout(resolve, 10));
            timer.done('Search finished', { cells: 19 });

            expect(firstLine()).toMatch(/\[Test\] Search finished cells=19 ms=\d+\.\d{2}$/);
        });

        it('should stay quiet above debug level', () => {
            setLogLevel('info');
            createTimer(createLogger('Test')).done('Search finished');

            expect(consoleSpy).not.toHaveBeenCalled();
        });
    });

    describe('root logger', () => {
        it('should use the library prefix', () => {
            setLogLevel('info');
            logger.info('Root logger test');

            expect(firstLine()).toContain('[Gridsight] Root logger test');
        });
    });

    it('should append fields as key=value pairs', () => {
        setLogLevel('info');

        createLogger('Fov').info('Buffer recomputed', { x: 2, y: 5, stale: false });

        expect(consoleSpy).toHaveBeenCalledTimes(1);
        expect(firstLine()).toMatch(/ \[Fov\] Buffer recomputed x=2 y=5 stale=false$/);
    });
});
