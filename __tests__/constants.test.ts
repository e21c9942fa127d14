import { describe, it, expect } from 'vitest';
import { CLOSE_CODES, HEALTH_CHECK, REALTIME_DEFAULTS } from '../src/core/constants.js';

describe('constants', () => {
  it('should have all required realtime defaults', () => {
    expect(REALTIME_DEFAULTS.WRITE_WAIT_MS).toBe(10000);
    expect(REALTIME_DEFAULTS.PONG_WAIT_MS).toBe(60000);
    expect(REALTIME_DEFAULTS.MAX_MESSAGE_SIZE).toBe(512);
    expect(REALTIME_DEFAULTS.SEND_QUEUE_SIZE).toBe(256);
    expect(REALTIME_DEFAULTS.HUB_INTAKE_SIZE).toBe(256);
    expect(REALTIME_DEFAULTS.BRIDGE_RETRY_DELAY_MS).toBe(1000);
  });

  it('should close sockets normally by default', () => {
    expect(CLOSE_CODES.NORMAL).toBe(1000);
    expect(CLOSE_CODES.GOING_AWAY).toBe(1001);
  });

  it('should have all required health check values', () => {
    expect(HEALTH_CHECK.MAX_RETRIES).toBe(30);
    expect(HEALTH_CHECK.RETRY_DELAY_MS).toBe(2000);
    expect(HEALTH_CHECK.CONNECTION_TIMEOUT_MS).toBe(1000);
  });
});
