import { EnvironmentSchema, validateEnvironment } from './environment';

describe('validateEnvironment', () => {
  it('applies defaults for an empty environment', () => {
    expect(validateEnvironment({})).toEqual({
      ANTHROPIC_API_KEY: undefined,
      ANTHROPIC_MODEL: 'claude-haiku-4-5-20251001',
      SUPABASE_URL: undefined,
      SUPABASE_KEY: undefined,
      SEARXNG_URL: undefined,
      REPORTS_DIR: 'reports',
      TURN_TIMEOUT_MS: 300000,
      STAGE_MAX_ITERATIONS: 10,
      PORT: 3001,
    });
  });

  it('coerces numeric variables and treats blanks as unset', () => {
    const env = validateEnvironment({ TURN_TIMEOUT_MS: '60000', PORT: '8080', SEARXNG_URL: '' });

    expect(env.TURN_TIMEOUT_MS).toBe(60000);
    expect(env.PORT).toBe(8080);
    expect(env.SEARXNG_URL).toBeUndefined();
  });

  it('rejects a malformed URL', () => {
    expect(() => validateEnvironment({ SUPABASE_URL: 'not a url' })).toThrow(/^Invalid environment: SUPABASE_URL: /);
  });

  it('rejects a non-positive timeout', () => {
    expect(EnvironmentSchema.safeParse({ TURN_TIMEOUT_MS: '0' }).success).toBe(false);
  });
});
