/**
 * Message Payload Builders
 *
 * Shapes the per-type content of `POST /message/v4/send/`.
 */

import type {
  CardDocument,
  ImageContent,
  MessageContent,
  MessagePayload,
  MessageType,
  PostContent,
  PostElement,
  TextContent,
} from './types.js';

export const DEFAULT_POST_LOCALE = 'zh_cn';

export interface OutgoingMessage {
  content?: MessageContent;
  card?: CardDocument;
  /** Card is shared: an update is shown to every recipient */
  isShared?: boolean;
}

export function textContent(text: string): TextContent {
  return { text };
}

export function imageContent(imageKey: string): ImageContent {
  return { image_key: imageKey };
}

/**
 * Rich-text post content; each inner array is one line
 */
export function postContent(
  title: string,
  content: PostElement[][],
  locale: string = DEFAULT_POST_LOCALE
): PostContent {
  return { post: { [locale]: { title, content } } };
}

export function isCardDocument(value: unknown): value is CardDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function assertCardDocument(value: unknown): asserts value is CardDocument {
  if (!isCardDocument(value)) {
    throw new TypeError('Interactive card must be a JSON object');
  }
}

/**
 * Build the frozen payload for one destination. A card takes precedence over content.
 */
export function buildPayload(
  chatId: string,
  msgType: MessageType,
  message: OutgoingMessage
): MessagePayload {
  if (message.card !== undefined) {
    return Object.freeze({
      chat_id: chatId,
      msg_type: msgType,
      card: message.card,
      update_multi: message.isShared ?? false,
    });
  }

  return Object.freeze({
    chat_id: chatId,
    msg_type: msgType,
    ...(message.content !== undefined ? { content: message.content } : {}),
  });
}
