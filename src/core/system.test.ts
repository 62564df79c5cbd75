import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { SystemScheduler, System, TickContext, TickOverrunReport } from './system';
import { World } from './world';
import { ComponentType } from './component';
import { resolveConfig, tickDt } from '../config';
import { createTransform } from '../components';
import { captureLogs, LogCapture } from '../testing/log-capture';

const config = resolveConfig();

function context(world: World, tick: number = 1): TickContext {
  return { world, tick, dt: tickDt(config), config, inputs: new Map(), isSimulated: () => true };
}

function recorder(name: string, priority: number, log: string[]): System {
  return {
    name,
    priority,
    requiredComponents: [],
    enabled: true,
    update() {
      log.push(name);
    }
  };
}

describe('SystemScheduler', () => {
  let world: World;
  let capture: LogCapture;

  beforeEach(() => {
    world = new World(64);
    capture = captureLogs('debug');
  });

  afterEach(() => {
    capture.restore();
  });

  test('runs systems by priority, ties in registration order', () => {
    const ran: string[] = [];
    const scheduler = new SystemScheduler();
    scheduler.add(recorder('collision', 300, ran));
    scheduler.add(recorder('character', 100, ran));
    scheduler.add(recorder('ai', 100, ran));
    scheduler.add(recorder('movement', 200, ran));

    expect(scheduler.getOrder()).toEqual(['character', 'ai', 'movement', 'collision']);
    scheduler.runTick(context(world));
    expect(ran).toEqual(['character', 'ai', 'movement', 'collision']);
  });

  test('skips disabled systems and unregisters through the returned function', () => {
    const ran: string[] = [];
    const scheduler = new SystemScheduler();
    const removeA = scheduler.add(recorder('a', 1, ran));
    scheduler.add(recorder('b', 2, ran));
    scheduler.setEnabled('b', false);

    scheduler.runTick(context(world));
    removeA();
    scheduler.runTick(context(world, 2));

    expect(ran).toEqual(['a']);
    expect(scheduler.getOrder()).toEqual(['b']);
  });

  test('rejects duplicate names', () => {
    const scheduler = new SystemScheduler();
    scheduler.add(recorder('a', 1, []));
    expect(() => scheduler.add(recorder('a', 2, []))).toThrow("System 'a' is already registered");
  });

  test('passes the matching entities to each system', () => {
    const withTransform = world.createEntity();
    world.addComponent(withTransform, ComponentType.Transform, createTransform());
    world.createEntity();

    const seen: number[] = [];
    const scheduler = new SystemScheduler();
    scheduler.add({
      name: 'collect',
      priority: 0,
      requiredComponents: [ComponentType.Transform],
      enabled: true,
      update(entities) {
        for (const id of entities) seen.push(id);
      }
    });
    scheduler.runTick(context(world));
    expect(seen).toEqual([withTransform]);
  });

  test('rejects a system that returns a promise', () => {
    const scheduler = new SystemScheduler();
    scheduler.add({
      name: 'async',
      priority: 0,
      requiredComponents: [],
      enabled: true,
      update: async () => undefined
    });

    expect(() => scheduler.runTick(context(world))).toThrow("System 'async' returned a Promise");
    expect(capture.messages('error')).toEqual(["[scheduler] Error in system 'async' at tick 1:"]);
  });

  test('flushes deferred mutations even when a system throws', () => {
    const scheduler = new SystemScheduler();
    let spawned = -1;
    scheduler.add({
      name: 'spawner',
      priority: 0,
      requiredComponents: [],
      enabled: true,
      update(_entities, ctx) {
        spawned = ctx.world.createEntity();
        throw new Error('boom');
      }
    });

    expect(() => scheduler.runTick(context(world))).toThrow('boom');
    expect(world.pendingCommands).toBe(0);
    expect(world.query([]).toArray()).toEqual([spawned]);
  });

  test('reports ticks that exceed the budget', () => {
    let clock = 0;
    const reports: TickOverrunReport[] = [];
    const scheduler = new SystemScheduler({
      now: () => {
        const value = clock;
        clock += 20;
        return value;
      },
      onTickOverrun: report => reports.push(report)
    });
    scheduler.add(recorder('slow', 0, []));

    scheduler.runTick(context(world, 7));

    expect(reports).toEqual([{ tick: 7, durationMs: 20, budgetMs: 1000 / 60 }]);
    expect(capture.messages('warn')).toEqual(['[scheduler] Tick 7 took 20.00ms (budget 16.67ms)']);
  });
});
