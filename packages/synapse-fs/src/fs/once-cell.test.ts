import { describe, expect, it, vi } from 'vitest';
import { OnceCell } from './once-cell';

describe('OnceCell', () => {
  it('shares one computation between concurrent callers', async () => {
    const cell = new OnceCell<number>();
    const init = vi.fn(async () => 42);

    const values = await Promise.all([cell.get(init), cell.get(init)]);

    expect(values).toEqual([42, 42]);
    expect(init).toHaveBeenCalledTimes(1);
    expect(cell.peek()).toBe(42);
    expect(cell.isSet()).toBe(true);
  });

  it('retries after a rejected computation', async () => {
    const cell = new OnceCell<string>();
    const init = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    await expect(cell.get(init)).rejects.toThrow('boom');
    expect(cell.peek()).toBeUndefined();
    await expect(cell.get(init)).resolves.toBe('ok');
    expect(init).toHaveBeenCalledTimes(2);
  });
});
