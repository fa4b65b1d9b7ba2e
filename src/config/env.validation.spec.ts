import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('converts numeric strings from the environment', () => {
    const env = validateEnv({
      INTENT_FAST_PATH_THRESHOLD: '0.8',
      WEATHER_TTL_SECONDS: '600',
    });

    expect(env.INTENT_FAST_PATH_THRESHOLD).toBe(0.8);
    expect(env.WEATHER_TTL_SECONDS).toBe(600);
  });

  it('accepts an empty environment', () => {
    expect(() => validateEnv({})).not.toThrow();
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => validateEnv({ INTENT_ACCEPTANCE_THRESHOLD: '1.5' })).toThrow(
      /Invalid assistant configuration/,
    );
  });

  it('rejects a non-positive TTL', () => {
    expect(() => validateEnv({ EVENTS_TTL_SECONDS: '0' })).toThrow(
      /Invalid assistant configuration/,
    );
  });
});
