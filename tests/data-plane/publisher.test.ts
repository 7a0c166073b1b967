import { InMemoryEventBus } from '../../src/data-plane/publisher';
import { EventMessage } from '../../src/domain/events';
import { LogEntry, createLogger, resetLogHandler, setLogHandler } from '../../src/logger';
import { rejectionOf } from '../helpers/fixtures';

describe('InMemoryEventBus', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('delivers messages in publish order with JSON payloads', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    const received: EventMessage[] = [];
    bus.subscribe('profile-initialised', (message) => {
      received.push(message);
    });

    await bus.publish('profile-initialised', { project_id: 'p1' });
    await bus.publish('profile-initialised', { project_id: 'p2' });
    expect(received).toEqual([]);

    await bus.drain();
    expect(received.map((m) => m.payload)).toEqual(['{"project_id":"p1"}', '{"project_id":"p2"}']);
    expect(received.every((m) => m.topic === 'profile-initialised')).toBe(true);
    expect(received[0].id).not.toBe(received[1].id);
  });

  it('only delivers to subscribers of the topic', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    const topics: string[] = [];
    bus.subscribe('a', (message) => {
      topics.push(`a:${message.payload}`);
    });
    bus.subscribe('b', (message) => {
      topics.push(`b:${message.payload}`);
    });

    await bus.publish('b', 1);
    await bus.drain();
    expect(topics).toEqual(['b:1']);
  });

  it('keeps delivering after a subscriber fails', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    const seen: string[] = [];
    bus.subscribe('t', () => {
      throw new Error('handler broke');
    });
    bus.subscribe('t', (message) => {
      seen.push(message.payload);
    });

    await bus.publish('t', 'first');
    await bus.drain();

    expect(seen).toEqual(['"first"']);
    const failures = entries.filter((entry) => entry.message === 'Event subscriber failed');
    expect(failures).toHaveLength(1);
    expect(failures[0].context).toMatchObject({ topic: 't', error: 'handler broke', component: 'event-bus' });
  });

  it('rejects publishes once the queue is full', async () => {
    const bus = new InMemoryEventBus(2, createLogger());
    await bus.publish('t', 1);
    await bus.publish('t', 2);
    expect(bus.pending()).toBe(2);

    const err = await rejectionOf(bus.publish('t', 3));
    expect(err.code).toBe('ResourceExhausted');
    expect(err.message).toBe('event queue is full (2 messages)');

    await bus.drain();
    expect(bus.pending()).toBe(0);
    await expect(bus.publish('t', 4)).resolves.toBeUndefined();
    await bus.drain();
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    const seen: string[] = [];
    const unsubscribe = bus.subscribe('t', (message) => {
      seen.push(message.payload);
    });

    await bus.publish('t', 'kept');
    await bus.drain();
    unsubscribe();
    await bus.publish('t', 'dropped');
    await bus.drain();

    expect(seen).toEqual(['"kept"']);
  });

  it('waits for async subscribers before draining', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    const done: string[] = [];
    bus.subscribe('t', async (message) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done.push(message.payload);
    });

    await bus.publish('t', 'slow');
    await bus.drain();
    expect(done).toEqual(['"slow"']);
  });

  it('drains immediately when idle', async () => {
    const bus = new InMemoryEventBus(16, createLogger());
    await expect(bus.drain()).resolves.toBeUndefined();
  });
});
