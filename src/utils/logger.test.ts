/**
 * Tests for the logger utility
 * Covers: level functions, stderr destination, environment-based configuration and correlation IDs
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { withCorrelationAsync } from './correlation.js';

// Mock pino before importing logger
vi.mock('pino', () => {
  const mockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    flush: vi.fn(),
  };

  return {
    default: Object.assign(vi.fn(() => mockLogger), {
      destination: vi.fn(() => ({ fd: 2 })),
    }),
  };
});

// Mock config
vi.mock('../config.js', () => ({
  getConfig: vi.fn(() => ({
    logLevel: 'INFO',
    nodeEnv: 'production',
  })),
}));

describe('Logger', () => {
  let mockPinoInstance: ReturnType<typeof pino>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockPinoInstance = pino();
  });

  afterEach(async () => {
    const { resetLogger } = await import('./logger.js');
    resetLogger();
  });

  describe('level functions', () => {
    it('logs a debug message without context', async () => {
      const { debug } = await import('./logger.js');

      debug('Test debug message');

      expect(mockPinoInstance.debug).toHaveBeenCalledWith('Test debug message');
      expect(mockPinoInstance.debug).toHaveBeenCalledTimes(1);
    });

    it('logs an info message with context', async () => {
      const { info } = await import('./logger.js');

      const context = { module: 'dispatcher', tool: 'search_drive' };
      info('Tool call started', context);

      expect(mockPinoInstance.info).toHaveBeenCalledWith(context, 'Tool call started');
    });

    it('logs a warn message with context', async () => {
      const { warn } = await import('./logger.js');

      warn('Retrying after rate limit', { attempt: 2 });

      expect(mockPinoInstance.warn).toHaveBeenCalledWith({ attempt: 2 }, 'Retrying after rate limit');
    });

    it('logs an error message without context', async () => {
      const { error } = await import('./logger.js');

      error('Refresh failed');

      expect(mockPinoInstance.error).toHaveBeenCalledWith('Refresh failed');
    });
  });

  describe('destination', () => {
    it('writes to stderr outside development', async () => {
      const { info } = await import('./logger.js');

      info('test');

      expect(pino.destination).toHaveBeenCalledWith(2);
      expect(pino).toHaveBeenCalledWith({ level: 'info' }, { fd: 2 });
    });

    it('uses pino-pretty on stderr in development', async () => {
      const { getConfig } = await import('../config.js');
      vi.mocked(getConfig).mockReturnValueOnce({
        ...getConfig(),
        logLevel: 'DEBUG',
        nodeEnv: 'development',
      });
      const { info } = await import('./logger.js');

      info('test');

      expect(pino).toHaveBeenCalledWith(
        expect.objectContaining({
          level: 'debug',
          transport: expect.objectContaining({
            target: 'pino-pretty',
            options: expect.objectContaining({ destination: 2 }),
          }),
        })
      );
    });
  });

  describe('correlation', () => {
    it('adds the correlation ID inside a correlation context', async () => {
      const { info } = await import('./logger.js');

      await withCorrelationAsync(async () => {
        info('inside', { module: 'test' });
      }, { correlationId: 'corr-1' });

      expect(mockPinoInstance.info).toHaveBeenCalledWith(
        { correlationId: 'corr-1', module: 'test' },
        'inside'
      );
    });

    it('adds a context object when only a correlation ID is present', async () => {
      const { error } = await import('./logger.js');

      await withCorrelationAsync(async () => {
        error('inside');
      }, { correlationId: 'corr-2' });

      expect(mockPinoInstance.error).toHaveBeenCalledWith({ correlationId: 'corr-2' }, 'inside');
    });

    it('adds the tool name of the current call', async () => {
      const { warn } = await import('./logger.js');

      await withCorrelationAsync(async () => {
        warn('Retrying after rate limit', { attempt: 1 });
      }, { correlationId: 'corr-3', toolName: 'search_drive' });

      expect(mockPinoInstance.warn).toHaveBeenCalledWith(
        { correlationId: 'corr-3', tool: 'search_drive', attempt: 1 },
        'Retrying after rate limit'
      );
    });
  });
});
