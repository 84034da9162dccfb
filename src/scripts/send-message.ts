#!/usr/bin/env node
/**
 * Send Message Script
 *
 * Usage:
 *   node dist/scripts/send-message.js text "Deploy finished"
 *   node dist/scripts/send-message.js image https://example.com/chart.png --chat oc_123
 *   node dist/scripts/send-message.js groups
 */

import { config } from 'dotenv';
config();

import { getFeishuClient } from '../feishu/client.js';
import { formatResult, parseArgs } from './args.js';

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  const client = getFeishuClient();

  if (command.kind === 'groups') {
    for (const group of await client.getGroups()) {
      console.log(`${group.chat_id}\t${group.name ?? ''}`);
    }
    return;
  }

  const targets = command.chatIds.length > 0 ? command.chatIds : undefined;
  const results =
    command.kind === 'text'
      ? await client.sendText(command.text, targets)
      : await client.sendImage(command.url, targets);

  for (const result of results) {
    console.log(formatResult(result));
  }
  if (results.some((result) => !result.ok)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Failed to send message:', error instanceof Error ? error.message : error);
  process.exit(1);
});
