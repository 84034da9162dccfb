import { describe, it, expect, vi } from 'vitest';
import { resolveDestinations } from './destinations.js';

const groups = [
  { chat_id: 'oc_a', name: 'A' },
  { chat_id: 'oc_b', name: 'B' },
];

describe('resolveDestinations', () => {
  it('should return an explicit list unchanged', async () => {
    const listAll = vi.fn(async () => groups);

    await expect(resolveDestinations(['a', 'b'], listAll)).resolves.toEqual(['a', 'b']);
    expect(listAll).not.toHaveBeenCalled();
  });

  it('should wrap a single id in a list', async () => {
    const listAll = vi.fn(async () => groups);

    await expect(resolveDestinations('a', listAll)).resolves.toEqual(['a']);
    expect(listAll).not.toHaveBeenCalled();
  });

  it('should fall back to every known group', async () => {
    const listAll = vi.fn(async () => groups);

    await expect(resolveDestinations(undefined, listAll)).resolves.toEqual(['oc_a', 'oc_b']);
    expect(listAll).toHaveBeenCalledTimes(1);
  });

  it('should keep an explicit empty list empty', async () => {
    const listAll = vi.fn(async () => groups);

    await expect(resolveDestinations([], listAll)).resolves.toEqual([]);
    expect(listAll).not.toHaveBeenCalled();
  });

  it('should propagate failures of the group lookup', async () => {
    const listAll = vi.fn(async () => {
      throw new Error('lookup failed');
    });

    await expect(resolveDestinations(undefined, listAll)).rejects.toThrow('lookup failed');
  });
});
