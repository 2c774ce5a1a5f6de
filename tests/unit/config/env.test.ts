import {
  EnvSchema,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from '../../../src/runtime/config/env';
import { config } from '../../../src/runtime/config';

describe('environment config', () => {
  describe('parseEnv', () => {
    it('applies defaults to an empty environment', () => {
      const result = parseEnv({});

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'pretty',
        BOARD_WIDTH: 10,
        BOARD_HEIGHT: 24,
        STACKBOARD_TRACE_TALLIES: false,
      });
    });

    it('coerces numeric and boolean variables', () => {
      const result = parseEnv({
        BOARD_WIDTH: '6',
        BOARD_HEIGHT: '12',
        STACKBOARD_TRACE_TALLIES: '1',
        LOG_FILE: 'logs/board.log',
      });

      expect(result.data?.BOARD_WIDTH).toBe(6);
      expect(result.data?.BOARD_HEIGHT).toBe(12);
      expect(result.data?.STACKBOARD_TRACE_TALLIES).toBe(true);
      expect(result.data?.LOG_FILE).toBe('logs/board.log');
    });

    it('reports each invalid variable by path', () => {
      const result = parseEnv({ BOARD_WIDTH: '0', LOG_LEVEL: 'verbose' });

      expect(result.success).toBe(false);
      expect(result.data).toBeUndefined();
      expect(result.errors?.map((e) => e.path).sort()).toEqual(['BOARD_WIDTH', 'LOG_LEVEL']);
    });

    it('rejects a non-numeric board size', () => {
      const result = parseEnv({ BOARD_HEIGHT: 'tall' });

      expect(result.success).toBe(false);
      expect(result.errors?.[0]?.path).toBe('BOARD_HEIGHT');
    });
  });

  it('treats the environment as test under Jest', () => {
    const raw = EnvSchema.parse({ NODE_ENV: 'production' });

    expect(getEffectiveNodeEnv(raw)).toBe('test');
    expect(isTest('test')).toBe(true);
    expect(isProduction('production')).toBe(true);
    expect(isProduction('development')).toBe(false);
  });

  it('exposes a frozen application config', () => {
    expect(Object.isFrozen(config)).toBe(true);
    expect(config.nodeEnv).toBe('test');
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.logging.level).toBe('error');
    expect(config.logging.file).toBeUndefined();
    expect(config.board).toEqual({ width: 10, height: 24, traceTallies: false });
  });
});
