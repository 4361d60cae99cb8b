import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { validate, truncateString, tokenize } from '../../../src/utils/validation.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { withTimeout } from '../../../src/utils/timeout.js';
import { ProviderTimeoutError } from '../../../src/utils/errors.js';

describe('Validation', () => {
  describe('validate', () => {
    it('should return data for valid input', () => {
      const schema = z.object({ name: z.string() });
      expect(validate(schema, { name: 'test' })).toEqual({ name: 'test' });
    });

    it('should apply schema defaults', () => {
      const schema = z.object({ timezone: z.string().default('UTC') });
      expect(validate(schema, {})).toEqual({ timezone: 'UTC' });
    });

    it('should throw ValidationError naming the failing field', () => {
      const schema = z.object({ name: z.string() });

      expect(() => validate(schema, { name: 123 }, 'userData')).toThrow(ValidationError);
      try {
        validate(schema, { name: 123 }, 'userData');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe('name');
        }
      }
    });

    it('should fall back to the given field name for top-level failures', () => {
      try {
        validate(z.string(), 42, 'query');
      } catch (error) {
        expect(error instanceof ValidationError && error.field).toBe('query');
      }
    });
  });

  describe('truncateString', () => {
    it('should leave short strings alone', () => {
      expect(truncateString('short', 10)).toBe('short');
    });

    it('should truncate with an ellipsis', () => {
      expect(truncateString('hello world', 8)).toBe('hello...');
    });
  });

  describe('tokenize', () => {
    it('should lower-case, split on non-alphanumerics and deduplicate', () => {
      expect(tokenize('The weather, the TIME: 55+55')).toEqual(['the', 'weather', 'time', '55']);
    });

    it('should return nothing for punctuation only', () => {
      expect(tokenize('+-*/')).toEqual([]);
    });
  });
});

describe('withTimeout', () => {
  it('should resolve with the operation result', async () => {
    await expect(withTimeout('op', 1000, async () => 'ok')).resolves.toBe('ok');
  });

  it('should reject with ProviderTimeoutError and abort the operation', async () => {
    let aborted = false;
    const pending = withTimeout(
      'slow',
      20,
      (signal) =>
        new Promise<string>((resolve) => {
          signal.addEventListener('abort', () => {
            aborted = true;
          });
          setTimeout(() => resolve('late'), 1000);
        })
    );

    await expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);
    expect(aborted).toBe(true);
  });

  it('should forward an already aborted parent signal', async () => {
    const parent = new AbortController();
    parent.abort();

    const seen = await withTimeout('op', 1000, async (signal) => signal.aborted, parent.signal);

    expect(seen).toBe(true);
  });
});
