import { z } from 'zod';

export const CommandType = {
  TOPIC_LIST: 'topic.list',
  TOPIC_SUBSCRIBE: 'topic.subscribe',
  TOPIC_UNSUBSCRIBE: 'topic.unsubscribe',
} as const;

export type CommandTypeValue = (typeof CommandType)[keyof typeof CommandType];

/** Frame type the bridge uses when it pushes a message from a subscribed topic. */
export const TOPIC_MESSAGE_FRAME = 'topic.message';

export const BridgeResponseSchema = z.object({
  id: z.string().nullable(),
  status: z.enum(['ok', 'error']),
  data: z.unknown(),
  timestamp: z.number(),
});

export type BridgeResponse = z.infer<typeof BridgeResponseSchema>;

export const TopicMessageFrameSchema = z.object({
  type: z.literal(TOPIC_MESSAGE_FRAME),
  topic: z.string().min(1),
  message_type: z.string().optional(),
  msg: z.unknown(),
  timestamp: z.number(),
});

export type TopicMessageFrame = z.infer<typeof TopicMessageFrameSchema>;

export const TopicListSchema = z.object({
  topics: z.array(z.object({
    name: z.string().min(1),
    type: z.string(),
  })),
});
