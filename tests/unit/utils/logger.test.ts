import winston from 'winston';
import { logger } from '../../../src/runtime/utils/logger';

describe('logger', () => {
  it('uses the configured level and service metadata', () => {
    expect(logger.level).toBe('error');
    expect(logger.defaultMeta).toEqual({ service: 'stackboard', environment: 'test' });
  });

  it('logs to the console only when no log file is configured', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});
