/**
 * Feishu Open API wire types
 *
 * Envelope and payload schemas are zod schemas so that decoded responses
 * are checked before anything reads them.
 */

import { z } from 'zod';

export const envelopeSchema = z
  .object({
    code: z.number().int(),
    msg: z.string(),
    data: z.unknown().optional(),
  })
  .passthrough();

/** `{code, msg, data?}` shape every endpoint returns */
export type ResponseEnvelope = z.infer<typeof envelopeSchema>;

export const tokenResponseSchema = z.object({
  tenant_access_token: z.string().min(1),
  expire: z.number().optional(),
});

export const destinationSchema = z
  .object({
    chat_id: z.string(),
    name: z.string().optional(),
    avatar: z.string().optional(),
    description: z.string().optional(),
    owner_open_id: z.string().optional(),
    owner_user_id: z.string().optional(),
  })
  .passthrough();

/** A chat the bot can post into */
export type Destination = z.infer<typeof destinationSchema>;

export const groupListDataSchema = z.object({
  groups: z.array(destinationSchema),
});

export const userInfoSchema = z
  .object({
    open_id: z.string().optional(),
    name: z.string().optional(),
    email: z.string().optional(),
    avatar_url: z.string().optional(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof userInfoSchema>;

export const userBatchDataSchema = z.object({
  user_infos: z.array(userInfoSchema),
});

export const imageUploadDataSchema = z.object({
  image_key: z.string().min(1),
});

export type MessageType = 'text' | 'image' | 'post' | 'interactive';

export interface TextContent {
  text: string;
}

export interface ImageContent {
  image_key: string;
}

/** One element of a rich-text post line */
export type PostElement =
  | { tag: 'text'; text: string; un_escape?: boolean }
  | { tag: 'a'; text: string; href: string }
  | { tag: 'at'; user_id: string }
  | { tag: 'img'; image_key: string; width?: number; height?: number };

export interface PostContent {
  post: Record<string, { title: string; content: PostElement[][] }>;
}

export type MessageContent = TextContent | ImageContent | PostContent;

/** Interactive card document, passed through verbatim */
export type CardDocument = Record<string, unknown>;

export interface MessagePayload {
  readonly chat_id: string;
  readonly msg_type: MessageType;
  readonly content?: MessageContent;
  readonly card?: CardDocument;
  readonly update_multi?: boolean;
}

export type DispatchResult =
  | { chatId: string; ok: true; response: ResponseEnvelope }
  | { chatId: string; ok: false; error: unknown };
