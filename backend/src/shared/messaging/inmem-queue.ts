/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Phase-1 transport: nothing is delivered yet, messages are kept in memory.
 * - Tests inspect what a service enqueued via drain() after the request completes.
 *
 * RULES:
 * - Implements Queue; drain() is the test/ops contract, services never call it.
 * - JavaScript is single-threaded, so the array needs no locking.
 */

import type { Queue, QueueMessage, QueueMessageType } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages of the given type and clears the queue.
   */
  drain<K extends QueueMessageType>(type: K): Extract<QueueMessage, { type: K }>[] {
    const drained = this.messages.splice(0, this.messages.length);
    return drained.filter((m): m is Extract<QueueMessage, { type: K }> => m.type === type);
  }
}
