import { describe, expect, it } from 'vitest';
import { createEvent, EngineEventType } from '../EngineEvents.js';
import { EventBus } from '../EventBus.js';

describe('EventBus', () => {
  it('should deliver to type listeners before wildcard listeners', async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('*', (event) => {
      seen.push(`*:${event.type}`);
    });
    bus.on(EngineEventType.TASK_LAUNCHED, (event) => {
      seen.push(`typed:${event.unit ?? ''}`);
    });

    await bus.emit(createEvent(EngineEventType.TASK_LAUNCHED, undefined, { unit: 'scan' }));

    expect(seen).toEqual(['typed:scan', '*:task.launched']);
  });

  it('should isolate a throwing handler from the others', async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('circuit.changed', () => {
      throw new Error('listener bug');
    });
    bus.on('circuit.changed', () => {
      seen.push('second');
    });

    await bus.emit(createEvent(EngineEventType.CIRCUIT_CHANGED));

    expect(seen).toEqual(['second']);
  });

  it('should stop delivering after unsubscribe and after a once handler fires', () => {
    const bus = new EventBus();
    let count = 0;
    let onceCount = 0;
    const unsubscribe = bus.on('task.completed', () => {
      count++;
    });
    bus.once('task.completed', () => {
      onceCount++;
    });

    bus.emitSync(createEvent(EngineEventType.TASK_COMPLETED));
    unsubscribe();
    bus.emitSync(createEvent(EngineEventType.TASK_COMPLETED));

    expect(count).toBe(1);
    expect(onceCount).toBe(1);
    expect(bus.listenerCount('task.completed')).toBe(0);
  });
});
