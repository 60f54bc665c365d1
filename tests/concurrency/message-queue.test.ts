/**
 * Message Queue Tests
 */

import { MessageQueue, createChannelPair } from '../../src/concurrency/index.js';

describe('MessageQueue', () => {
  let queue: MessageQueue<string>;

  beforeEach(() => {
    queue = new MessageQueue<string>({ capacity: 3 });
  });

  afterEach(() => {
    queue.close();
  });

  describe('send / tryReceive', () => {
    it('should deliver items in FIFO order', () => {
      queue.send('a');
      queue.send('b');
      queue.send('c');

      expect(queue.tryReceive()).toBe('a');
      expect(queue.tryReceive()).toBe('b');
      expect(queue.tryReceive()).toBe('c');
    });

    it('should return undefined when empty', () => {
      expect(queue.tryReceive()).toBeUndefined();
    });

    it('should ignore sends after close', () => {
      queue.close();
      expect(queue.send('late')).toBe(false);
      expect(queue.size).toBe(0);
      expect(queue.getStats().sent).toBe(0);
    });

    it('should keep queued items readable after close', () => {
      queue.send('a');
      queue.close();
      expect(queue.isClosed).toBe(true);
      expect(queue.tryReceive()).toBe('a');
    });
  });

  describe('capacity', () => {
    it('should refuse an item when full under reject', () => {
      const onFull = jest.fn();
      queue.on('full', onFull);

      expect(queue.send('a')).toBe(true);
      expect(queue.send('b')).toBe(true);
      expect(queue.send('c')).toBe(true);
      expect(queue.send('d')).toBe(false);

      expect(onFull).toHaveBeenCalledWith('d');
      expect(queue.drain()).toEqual(['a', 'b', 'c']);
      expect(queue.getStats().dropped).toBe(1);
    });

    it('should evict the oldest item under drop-oldest', () => {
      const dropping = new MessageQueue<string>({ capacity: 2, overflow: 'drop-oldest' });
      const onDropped = jest.fn();
      dropping.on('dropped', onDropped);

      dropping.send('a');
      dropping.send('b');
      expect(dropping.send('c')).toBe(true);

      expect(onDropped).toHaveBeenCalledWith('a');
      expect(dropping.drain()).toEqual(['b', 'c']);
    });

    it('should accept a forced item past the bound', () => {
      queue.send('a');
      queue.send('b');
      queue.send('c');

      expect(queue.send('shutdown', { force: true })).toBe(true);
      expect(queue.size).toBe(4);
    });

    it('should treat capacity 0 as unbounded', () => {
      const unbounded = new MessageQueue<number>({ capacity: 0 });
      for (let i = 0; i < 5000; i++) {
        expect(unbounded.send(i)).toBe(true);
      }
      expect(unbounded.size).toBe(5000);
    });

    it('should fall back to defaults for omitted options', () => {
      const defaults = new MessageQueue<string>({ capacity: undefined });
      expect(defaults.capacity).toBe(1000);
      expect(defaults.getStats().name).toBe('queue');
    });
  });

  describe('receive', () => {
    it('should return a queued item immediately', async () => {
      queue.send('a');
      await expect(queue.receive(1000)).resolves.toBe('a');
    });

    it('should wake up when an item arrives', async () => {
      const pending = queue.receive(5000);
      setTimeout(() => queue.send('later'), 5);
      await expect(pending).resolves.toBe('later');
    });

    it('should resolve undefined on timeout', async () => {
      await expect(queue.receive(10)).resolves.toBeUndefined();
    });

    it('should resolve undefined when the queue closes', async () => {
      const pending = queue.receive(5000);
      queue.close();
      await expect(pending).resolves.toBeUndefined();
    });

    it('should resolve undefined when aborted', async () => {
      const controller = new AbortController();
      const pending = queue.receive(5000, controller.signal);
      controller.abort();
      await expect(pending).resolves.toBeUndefined();
    });
  });

  describe('waitForMessage', () => {
    it('should resolve true at once when an item is queued', async () => {
      queue.send('a');
      await expect(queue.waitForMessage(1000)).resolves.toBe(true);
      expect(queue.size).toBe(1);
    });

    it('should resolve false for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(queue.waitForMessage(1000, controller.signal)).resolves.toBe(false);
    });
  });

  describe('getStats', () => {
    it('should count sent and received items', () => {
      queue.send('a');
      queue.send('b');
      queue.tryReceive();

      expect(queue.getStats()).toEqual({
        name: 'queue',
        size: 1,
        capacity: 3,
        sent: 2,
        received: 1,
        dropped: 0,
        closed: false,
      });
    });
  });
});

describe('MessageQueue with a concurrent producer and consumer', () => {
  const yieldToTimers = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

  async function consumeAll(queue: MessageQueue<number>): Promise<number[]> {
    const received: number[] = [];
    for (;;) {
      const item = await queue.receive(50);
      if (item !== undefined) {
        received.push(item);
      } else if (queue.isClosed && queue.size === 0) {
        return received;
      }
    }
  }

  it('should deliver every item once, in send order', async () => {
    const queue = new MessageQueue<number>();
    const expected = Array.from({ length: 200 }, (_, i) => i);

    const producer = (async () => {
      for (const item of expected) {
        queue.send(item);
        if (item % 3 === 0) {
          await yieldToTimers();
        } else {
          await Promise.resolve();
        }
      }
      queue.close();
    })();

    const [received] = await Promise.all([consumeAll(queue), producer]);

    expect(received).toEqual(expected);
    expect(queue.getStats()).toMatchObject({ sent: 200, received: 200, dropped: 0 });
  });

  it('should keep order when a bounded queue pushes back on the producer', async () => {
    const queue = new MessageQueue<number>({ capacity: 4 });
    const expected = Array.from({ length: 50 }, (_, i) => i);

    const producer = (async () => {
      for (const item of expected) {
        while (!queue.send(item)) {
          await yieldToTimers();
        }
      }
      queue.close();
    })();

    const [received] = await Promise.all([consumeAll(queue), producer]);

    expect(received).toEqual(expected);
  });
});

describe('createChannelPair', () => {
  it('should create two independent named queues', () => {
    const { inbound, outbound } = createChannelPair<string, number>({ capacity: 10 });

    inbound.send('command');
    outbound.send(1);
    inbound.close();

    expect(inbound.getStats().name).toBe('inbound');
    expect(outbound.getStats().name).toBe('outbound');
    expect(outbound.isClosed).toBe(false);
    expect(outbound.send(2)).toBe(true);
    expect(outbound.drain()).toEqual([1, 2]);
    expect(inbound.capacity).toBe(10);
  });
});
