import { describe, expect, it } from 'vitest';
import { ConfigurationError, reportFatal } from './errors.js';

describe('ConfigurationError', () => {
  it('should carry code, reporter and details', () => {
    const error = new ConfigurationError('applyProfiles', 'MISSING_PROFILE', "profile 'dev' is not defined", {
      profile: 'dev',
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe("applyProfiles: profile 'dev' is not defined");
    expect(error.code).toBe('MISSING_PROFILE');
    expect(error.who).toBe('applyProfiles');
    expect(error.details).toEqual({ profile: 'dev' });
  });

  it('should default details to an empty object', () => {
    expect(new ConfigurationError('access', 'UNKNOWN_ACCESS_PATH', 'no setting').details).toEqual({});
  });
});

describe('reportFatal', () => {
  it('should always throw a ConfigurationError', () => {
    expect(() => reportFatal('schema', 'DUPLICATE_SCHEMA_KEY', "duplicate key 'a'")).toThrow(
      new ConfigurationError('schema', 'DUPLICATE_SCHEMA_KEY', "duplicate key 'a'")
    );
  });
});
