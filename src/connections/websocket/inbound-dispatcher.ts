/**
 * Bounded inbound queue between the socket and message handlers.
 *
 * Inbound delivery is never quota-gated. When handlers fall behind and the
 * queue is full, the newest message is dropped and counted.
 */

import PQueue from "p-queue";

import { toError } from "@/lib/errors";

export interface InboundDispatcherConfig {
  /** Max concurrent handler runs (default: 1, preserves arrival order) */
  concurrency?: number;
  /** Max waiting plus running messages before dropping (default: 1000) */
  maxQueueSize?: number;
  /** Called with the running total whenever a message is dropped */
  onDrop?: (dropped: number) => void;
  /** Called when the handler throws or rejects */
  onError?: (error: Error) => void;
}

export interface InboundDispatcher<T> {
  /** Returns false when the message was dropped */
  enqueue: (message: T) => boolean;
  getQueueSize: () => number;
  getDroppedCount: () => number;
  waitForIdle: () => Promise<void>;
  /** Discards waiting messages and resets the dropped count */
  clear: () => void;
}

export const DEFAULT_MAX_INBOUND_QUEUE_SIZE = 1000;

/**
 * Creates a bounded inbound dispatcher.
 *
 * @example
 * ```typescript
 * const dispatcher = createInboundDispatcher<WebSocketResponse>(
 *   (message) => book.apply(message.data),
 *   { maxQueueSize: 500, onDrop: (n) => logger.warn("Dropped inbound messages", { dropped: n }) },
 * );
 *
 * transport.onMessage((data, generation) =>
 *   dispatcher.enqueue({ data, generation, receivedAt: Date.now() }),
 * );
 * ```
 */
export const createInboundDispatcher = <T>(
  handler: (message: T) => Promise<void> | void,
  config: InboundDispatcherConfig = {},
): InboundDispatcher<T> => {
  const {
    concurrency = 1,
    maxQueueSize = DEFAULT_MAX_INBOUND_QUEUE_SIZE,
    onDrop,
    onError,
  } = config;

  const queue = new PQueue({ concurrency });
  let droppedCount = 0;

  const getQueueSize = (): number => queue.size + queue.pending;

  const enqueue = (message: T): boolean => {
    if (getQueueSize() >= maxQueueSize) {
      droppedCount++;
      onDrop?.(droppedCount);
      return false;
    }

    void queue.add(async () => {
      try {
        await handler(message);
      } catch (error) {
        onError?.(toError(error));
      }
    });

    return true;
  };

  return {
    enqueue,
    getQueueSize,
    getDroppedCount: () => droppedCount,
    waitForIdle: () => queue.onIdle(),
    clear: () => {
      queue.clear();
      droppedCount = 0;
    },
  };
};
