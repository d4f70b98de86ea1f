import { describe, it, expect, afterEach } from 'vitest';
import { EventLog } from '../../../src/controller/event-log.js';
import { MessageBus, type BusMessage } from '../../../src/controller/message-bus.js';
import { openDatabase, type SqliteDatabase } from '../../../src/core/database.js';

describe('MessageBus', () => {
  it('should send and receive messages', () => {
    const bus = new MessageBus();
    const received: BusMessage[] = [];

    bus.subscribe('writer', (msg) => received.push(msg));

    const sent = bus.send({
      from: 'researcher',
      to: 'writer',
      type: 'task.delegated',
      payload: { task_id: 'task-1' },
    });

    expect(received).toEqual([sent]);
    expect(sent.from).toBe('researcher');
    expect(typeof sent.timestamp).toBe('number');
    expect(sent.id).toHaveLength(21);

    bus.destroy();
  });

  it('should deliver broadcasts once to subscribeAll', () => {
    const bus = new MessageBus();
    const all: BusMessage[] = [];
    const direct: BusMessage[] = [];

    bus.subscribeAll((msg) => all.push(msg));
    bus.subscribe('*', (msg) => direct.push(msg));

    bus.send({ from: 'kill-switch', to: '*', type: 'system.kill', payload: {} });
    bus.send({ from: 'controller', to: 'writer', type: 'agent.status', payload: {} });

    expect(direct).toHaveLength(1);
    expect(all).toHaveLength(2);

    bus.destroy();
  });

  it('should filter by message type', () => {
    const bus = new MessageBus();
    const completed: BusMessage[] = [];

    bus.subscribeType('task.completed', (msg) => completed.push(msg));
    bus.send({ from: 'writer', to: 'researcher', type: 'task.started', payload: {} });
    bus.send({ from: 'writer', to: 'researcher', type: 'task.completed', payload: {} });

    expect(completed.map(m => m.type)).toEqual(['task.completed']);

    bus.destroy();
  });

  it('should support unsubscribe', () => {
    const bus = new MessageBus();
    const received: BusMessage[] = [];

    const unsub = bus.subscribe('writer', (msg) => received.push(msg));
    bus.send({ from: 'a', to: 'writer', type: 'agent.status', payload: {} });
    unsub();
    bus.send({ from: 'a', to: 'writer', type: 'agent.status', payload: {} });

    expect(received).toHaveLength(1);

    bus.destroy();
  });

  it('should keep a bounded, filterable history', () => {
    const bus = new MessageBus(2);

    bus.send({ from: 'a', to: 'b', type: 'task.started', payload: { n: 1 } });
    bus.send({ from: 'c', to: 'd', type: 'task.completed', payload: { n: 2 } });
    bus.send({ from: 'a', to: 'd', type: 'task.completed', payload: { n: 3 } });

    expect(bus.getHistory().map(m => m.payload.n)).toEqual([2, 3]);
    expect(bus.getHistory({ from: 'a' }).map(m => m.payload.n)).toEqual([3]);
    expect(bus.getHistory({ to: 'd', type: 'task.completed' })).toHaveLength(2);

    bus.clearHistory();
    expect(bus.getHistory()).toEqual([]);

    bus.destroy();
  });
});

describe('EventLog', () => {
  let db: SqliteDatabase;

  afterEach(() => {
    db.close();
  });

  it('should persist bus traffic once attached', () => {
    db = openDatabase(':memory:');
    const bus = new MessageBus();
    const log = new EventLog(db);

    bus.send({ from: 'a', to: 'b', type: 'task.started', payload: {} });
    log.attach(bus);
    const sent = bus.send({ from: 'controller', to: 'writer', type: 'agent.status', payload: { status: 'running' } });
    log.detach();
    bus.send({ from: 'a', to: 'b', type: 'task.completed', payload: {} });

    expect(log.recent()).toEqual([{
      id: sent.id,
      timestamp: sent.timestamp,
      type: 'agent.status',
      source: 'controller',
      target: 'writer',
      data: { status: 'running' },
    }]);

    bus.destroy();
  });

  it('should return the newest events first, filtered by type', () => {
    db = openDatabase(':memory:');
    const log = new EventLog(db);
    const base = { from: 'a', to: 'b', payload: {} };

    log.record({ ...base, id: 'e1', type: 'task.started', timestamp: 100 });
    log.record({ ...base, id: 'e2', type: 'task.completed', timestamp: 200 });
    log.record({ ...base, id: 'e3', type: 'task.started', timestamp: 300 });

    expect(log.recent().map(e => e.id)).toEqual(['e3', 'e2', 'e1']);
    expect(log.recent(1).map(e => e.id)).toEqual(['e3']);
    expect(log.recent(10, 'task.started').map(e => e.id)).toEqual(['e3', 'e1']);
  });
});
