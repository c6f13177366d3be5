import { parseConfig } from '../../src/config.js';
import { ValidationError } from '../../src/errors.js';

describe('parseConfig', () => {
  it('should fill in defaults for an empty environment', () => {
    expect(parseConfig({})).toEqual({
      CORS_ORIGIN: '*',
      HOST: 'localhost',
      LOG_LEVEL: 'info',
      NAME: 'promptlab-api',
      NODE_ENV: 'development',
      PORT: 8000,
      STORAGE_TYPE: 'memory',
      VERSION: '0.1.0',
    });
  });

  it('should coerce the port to a number', () => {
    expect(parseConfig({ PORT: '3003' }).PORT).toBe(3003);
  });

  it('should reject an unknown storage type and a bad port together', () => {
    let caught: unknown;
    try {
      parseConfig({ PORT: 'not-a-port', STORAGE_TYPE: 'postgres' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ statusCode: 422 });
    const message = caught instanceof Error ? caught.message : '';
    expect(message.split('\n')[0]).toBe('Invalid or missing environment variables:');
    expect(message).toMatch(/^- PORT: /m);
    expect(message).toMatch(/^- STORAGE_TYPE: /m);
  });

  it('should reject an unknown log level', () => {
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow(ValidationError);
  });
});
