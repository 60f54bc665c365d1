/**
 * Concurrency Module
 */

export type {
  OverflowPolicy,
  MessageQueueOptions,
  SendOptions,
  MessageQueueStats,
  MessageQueueEvents,
  ChannelPairOptions,
  ChannelPair,
} from './message-queue.js';

export { MessageQueue, createChannelPair } from './message-queue.js';
