import type { Destination } from './types.js';

/** A single chat id, a list of chat ids, or undefined for every known group */
export type DestinationTarget = string | readonly string[] | undefined;

/**
 * Resolve the chat ids a send fans out to.
 *
 * Explicit ids are not checked against the known groups; an unknown id
 * fails in its own send.
 */
export async function resolveDestinations(
  target: DestinationTarget,
  listAll: () => Promise<Destination[]>
): Promise<string[]> {
  if (typeof target === 'string') {
    return [target];
  }
  if (target !== undefined) {
    return [...target];
  }
  const groups = await listAll();
  return groups.map((group) => group.chat_id);
}
