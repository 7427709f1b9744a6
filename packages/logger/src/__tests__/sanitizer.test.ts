/**
 * Sanitizer Tests
 */

import { maskSensitiveData } from '../sanitizer.js';

describe('maskSensitiveData', () => {
  it('should partially reveal long secrets', () => {
    expect(maskSensitiveData({ BOT_TOKEN: 'test-secret-value' })).toEqual({ BOT_TOKEN: 'test****alue' });
  });

  it('should fully mask short secrets', () => {
    expect(maskSensitiveData({ password: 'short' })).toEqual({ password: '****' });
  });

  it('should recurse into nested objects and arrays', () => {
    const input = {
      service: 'bot',
      env: { MONGO_URI: 'mongodb://mongodb:27017/', OWNER_ID: '12345' },
      list: [{ api_key: 'abc' }],
    };

    expect(maskSensitiveData(input)).toEqual({
      service: 'bot',
      env: { MONGO_URI: 'mong****017/', OWNER_ID: '12345' },
      list: [{ api_key: '****' }],
    });
  });

  it('should return primitives untouched', () => {
    expect(maskSensitiveData('plain')).toBe('plain');
    expect(maskSensitiveData(null)).toBeNull();
  });
});
