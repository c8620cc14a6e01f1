// Tests for typed store results

import { describe, it, expect } from 'vitest';
import { settle } from './results.js';
import { NotFoundError } from './errors.js';

describe('settle', () => {
  it('wraps a resolved value', async () => {
    expect(await settle(Promise.resolve(7))).toEqual({ success: true, data: 7 });
  });

  it('turns store errors into failure results', async () => {
    const error = new NotFoundError('employee', 'emp-9');

    const result = await settle(Promise.reject(error));

    expect(result).toEqual({ success: false, error });
    expect(result.success ? undefined : result.error.code).toBe('NOT_FOUND');
  });

  it('rethrows anything else', async () => {
    await expect(settle(Promise.reject(new TypeError('bug')))).rejects.toThrow('bug');
  });
});
