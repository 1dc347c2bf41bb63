import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { componentLogger, createLogger, lazyLog } from '../../../src/utils/logger-helpers.js';

describe('Logger Helpers', () => {
  describe('createLogger', () => {
    it('uses the requested level and bindings', () => {
      const logger = createLogger('warn', { service: 'model-serving-test' });

      expect(logger.level).toBe('warn');
      expect(logger.bindings()).toEqual({ service: 'model-serving-test' });
    });
  });

  describe('componentLogger', () => {
    it('tags a child logger with the component', () => {
      const logger = componentLogger(pino({ level: 'silent' }), 'ModelCache');

      expect(logger?.bindings()).toEqual({ component: 'ModelCache' });
    });

    it('returns undefined without a parent', () => {
      expect(componentLogger(undefined, 'ModelCache')).toBeUndefined();
    });
  });

  describe('lazyLog', () => {
    it('skips building context when the level is disabled', () => {
      const logger = pino({ level: 'info' });
      const debugSpy = vi.spyOn(logger, 'debug');
      const builder = vi.fn(() => ({ modelName: 'heart' }));

      lazyLog(logger, 'debug', builder, 'Prediction served');

      expect(builder).not.toHaveBeenCalled();
      expect(debugSpy).not.toHaveBeenCalled();
    });

    it('logs with the built context when the level is enabled', () => {
      const logger = pino({ level: 'debug', enabled: false });
      vi.spyOn(logger, 'isLevelEnabled').mockReturnValue(true);
      const debugSpy = vi.spyOn(logger, 'debug').mockImplementation(() => undefined);

      lazyLog(logger, 'debug', () => ({ modelName: 'heart' }), 'Prediction served');

      expect(debugSpy).toHaveBeenCalledWith({ modelName: 'heart' }, 'Prediction served');
    });

    it('does nothing without a logger', () => {
      const builder = vi.fn(() => ({}));

      lazyLog(undefined, 'debug', builder, 'ignored');

      expect(builder).not.toHaveBeenCalled();
    });
  });
});
