import { describe, it, expect } from 'vitest';
import { loadServerConfig, parseSimConfig } from '../src/config';

describe('parseSimConfig', () => {
  it('fills in defaults', () => {
    expect(parseSimConfig({ width: 4, height: 3 })).toEqual({
      width: 4,
      height: 3,
      numDrones: 0,
      numTargets: 0,
      detectionRange: 1,
      occupancy: 'shared',
      maxRetries: 1,
      obstacles: [],
      passiveSensing: false,
    });
  });

  it('keeps a seed of either type', () => {
    expect(parseSimConfig({ width: 1, height: 1, seed: 'test-seed' }).seed).toBe('test-seed');
    expect(parseSimConfig({ width: 1, height: 1, seed: 7 }).seed).toBe(7);
  });

  it('raises InvalidConfig listing the bad fields', () => {
    expect(() => parseSimConfig({ width: 0, height: 2.5 })).toThrow(
      expect.objectContaining({
        code: 'InvalidConfig',
        message: 'width: Number must be greater than 0; height: Expected integer, received float',
      }),
    );
  });

  it('rejects an unknown occupancy policy', () => {
    expect(() => parseSimConfig({ width: 2, height: 2, occupancy: 'stacked' }))
      .toThrow(expect.objectContaining({ code: 'InvalidConfig' }));
  });
});

describe('loadServerConfig', () => {
  it('uses the defaults for an empty environment', () => {
    const config = loadServerConfig({});
    expect(config.port).toBe(9754);
    expect(config.tickIntervalMs).toBe(100);
    expect(config.isDev).toBe(true);
    expect(config.sim).toMatchObject({
      width: 20,
      height: 15,
      numDrones: 3,
      numTargets: 3,
      detectionRange: 2,
      occupancy: 'shared',
      passiveSensing: false,
    });
    expect(config.sim.seed).toBeUndefined();
  });

  it('reads every variable', () => {
    const config = loadServerConfig({
      PORT: '8080',
      TICK_INTERVAL_MS: '250',
      SIM_WIDTH: '10',
      SIM_HEIGHT: '8',
      SIM_DRONES: '2',
      SIM_TARGETS: '5',
      SIM_DETECTION_RANGE: '0',
      SIM_SEED: 'test-seed',
      SIM_OCCUPANCY: 'exclusive',
      SIM_PASSIVE_SENSING: '1',
      NODE_ENV: 'production',
    });

    expect(config.port).toBe(8080);
    expect(config.tickIntervalMs).toBe(250);
    expect(config.isDev).toBe(false);
    expect(config.sim).toMatchObject({
      width: 10,
      height: 8,
      numDrones: 2,
      numTargets: 5,
      detectionRange: 0,
      seed: 'test-seed',
      occupancy: 'exclusive',
      passiveSensing: true,
    });
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadServerConfig({ PORT: 'eighty' })).toThrow(expect.objectContaining({ code: 'InvalidConfig' }));
    expect(() => loadServerConfig({ SIM_PASSIVE_SENSING: 'maybe' }))
      .toThrow(expect.objectContaining({ code: 'InvalidConfig' }));
  });
});
