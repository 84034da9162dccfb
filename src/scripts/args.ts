/**
 * Argument handling for the send-message script
 */

import type { DispatchResult } from '../feishu/types.js';

export type Command =
  | { kind: 'text'; text: string; chatIds: string[] }
  | { kind: 'image'; url: string; chatIds: string[] }
  | { kind: 'groups' };

const USAGE = 'Usage: send-message <text <message> | image <url> | groups> [--chat <chat_id>]...';

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): Command {
  const positional: string[] = [];
  const chatIds: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--chat') {
      const chatId = argv[i + 1];
      if (!chatId) {
        throw new Error('--chat requires a chat id');
      }
      chatIds.push(chatId);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const [command, value] = positional;
  if (command === 'groups') {
    return { kind: 'groups' };
  }
  if (command === 'text' && value) {
    return { kind: 'text', text: value, chatIds };
  }
  if (command === 'image' && value) {
    return { kind: 'image', url: value, chatIds };
  }
  throw new Error(USAGE);
}

export function formatResult(result: DispatchResult): string {
  if (result.ok) {
    return `${result.chatId}: ok`;
  }
  const reason = result.error instanceof Error ? result.error.message : String(result.error);
  return `${result.chatId}: failed - ${reason}`;
}
