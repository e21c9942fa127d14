import { afterEach, describe, it, expect } from 'vitest';
import { cfg, positiveInt } from '../../src/core/config.js';
import { ValidationError } from '../../src/errors/index.js';

const VAR = 'LIVE_FEED_TEST_VALUE';

describe('config', () => {
  afterEach(() => {
    delete process.env[VAR];
  });

  describe('positiveInt', () => {
    it('should fall back when the variable is unset or empty', () => {
      expect(positiveInt(VAR, 256)).toBe(256);
      process.env[VAR] = '';
      expect(positiveInt(VAR, 256)).toBe(256);
    });

    it('should parse a positive integer', () => {
      process.env[VAR] = '1024';
      expect(positiveInt(VAR, 256)).toBe(1024);
    });

    it('should reject anything else', () => {
      process.env[VAR] = 'abc';
      expect(() => positiveInt(VAR, 256)).toThrow(ValidationError);
      process.env[VAR] = '0';
      expect(() => positiveInt(VAR, 256)).toThrow(`${VAR} must be a positive integer, got "0"`);
      process.env[VAR] = '2.5';
      expect(() => positiveInt(VAR, 256)).toThrow(ValidationError);
    });
  });

  describe('cfg.websocket', () => {
    it('should ping at nine tenths of the pong wait', () => {
      expect(cfg.websocket.pingPeriodMs).toBe(Math.floor((cfg.websocket.pongWaitMs * 9) / 10));
      expect(cfg.websocket.pingPeriodMs).toBeLessThan(cfg.websocket.pongWaitMs);
    });
  });
});
