/**
 * ROS2 type definitions shared by the bridge client and the recorder.
 */

import type { TopicMessageFrame } from '../bridge/protocol.js';

export interface RosTopic {
  name: string;
  type: string;
}

/**
 * The slice of the bridge the recorder needs: topic discovery, streaming
 * subscriptions, and delivery of streamed messages.
 */
export interface TopicSource {
  listTopics(): Promise<RosTopic[]>;
  subscribe(topic: string, messageType: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  onTopicMessage(listener: (frame: TopicMessageFrame) => void): () => void;
}
