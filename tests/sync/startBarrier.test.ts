import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { GroupView } from '../../src/application/sync/groupView';
import { ResyncBackoff } from '../../src/application/sync/resyncBackoff';
import { StartBarrier } from '../../src/application/sync/startBarrier';
import { createEngineHarness, type EngineHarness } from '../fakes/engineHarness';

function barrierFor(h: EngineHarness): { barrier: StartBarrier; backoff: ResyncBackoff } {
  const backoff = new ResyncBackoff(h.clock);
  const barrier = new StartBarrier({
    registry: h.registry,
    transport: h.transport,
    clock: h.clock,
    view: new GroupView(h.registry, h.transport, h.config),
    backoff,
    settings: h.settings,
  });
  return { barrier, backoff };
}

test('start barrier starts every member at its own clock reference', async () => {
  const h = createEngineHarness({ players: { kitchen: { syncAdjustMs: 30 } } });
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 5000 });
  const child = h.addPlayer('kitchen', { state: 'buffer_ready', jiffies: 7000 });
  h.group('living', 'kitchen');
  const { barrier, backoff } = barrierFor(h);

  const result = await barrier.handleBufferReady('living');

  assert.deepEqual(result, { masterId: 'living', started: ['living', 'kitchen'], polls: 0, timedOut: false });
  assert.deepEqual(master.valuesOf('unpause_at'), [5020]);
  assert.deepEqual(child.valuesOf('unpause_at'), [6990]);
  assert.equal(backoff.deadlineOf('living'), h.clock.now() + 1000);
  assert.equal(backoff.deadlineOf('kitchen'), h.clock.now() + 1000);
});

test('start barrier waits for a late member', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 100 });
  const child = h.addPlayer('kitchen', { state: 'buffering', jiffies: 200 });
  h.group('living', 'kitchen');
  h.clock.setTimer(250, () => {
    child.state = 'buffer_ready';
  });
  const { barrier } = barrierFor(h);
  const startedAt = h.clock.now();

  const result = await barrier.handleBufferReady('living');

  assert.deepEqual(result, { masterId: 'living', started: ['living', 'kitchen'], polls: 3, timedOut: false });
  assert.equal(h.clock.now() - startedAt, 300);
  assert.deepEqual(master.valuesOf('unpause_at'), [120]);
  assert.deepEqual(child.valuesOf('unpause_at'), [220]);
});

test('start barrier gives up after forty polls and starts anyway', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 100 });
  const child = h.addPlayer('kitchen', { state: 'buffering', jiffies: 200 });
  h.group('living', 'kitchen');
  const { barrier } = barrierFor(h);
  const startedAt = h.clock.now();

  const result = await barrier.handleBufferReady('living');

  assert.deepEqual(result, { masterId: 'living', started: ['living', 'kitchen'], polls: 40, timedOut: true });
  assert.equal(h.clock.now() - startedAt, 4000);
  assert.deepEqual(master.valuesOf('unpause_at'), [120]);
  assert.deepEqual(child.valuesOf('unpause_at'), [220]);
});

test('start barrier plays a single player right away', async () => {
  const h = createEngineHarness();
  const solo = h.addPlayer('office', { state: 'buffer_ready' });
  const { barrier } = barrierFor(h);

  assert.equal(await barrier.handleBufferReady('office'), null);
  assert.deepEqual(solo.commands(), ['play']);
});

test('start barrier ignores buffer ready from a child', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'playing' });
  const child = h.addPlayer('kitchen', { state: 'buffer_ready' });
  h.group('living', 'kitchen');
  const { barrier } = barrierFor(h);

  assert.equal(await barrier.handleBufferReady('kitchen'), null);
  assert.deepEqual(child.calls, []);
  assert.deepEqual(master.calls, []);
});

test('start barrier runs once per master at a time', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 100 });
  h.addPlayer('kitchen', { state: 'buffering', jiffies: 200 });
  h.group('living', 'kitchen');
  const { barrier } = barrierFor(h);

  const first = barrier.handleBufferReady('living');
  assert.equal(barrier.isPending('living'), true);
  assert.equal(await barrier.handleBufferReady('living'), null);
  const result = await first;

  assert.equal(result?.timedOut, true);
  assert.equal(barrier.isPending('living'), false);
  assert.deepEqual(master.valuesOf('unpause_at'), [120]);
});

test('start barrier skips members whose handle is gone', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 100 });
  h.addPlayer('kitchen', { state: 'buffer_ready', jiffies: 200 });
  h.group('living', 'kitchen');
  h.transport.remove('kitchen');
  const { barrier } = barrierFor(h);

  const result = await barrier.handleBufferReady('living');
  assert.deepEqual(result, { masterId: 'living', started: ['living'], polls: 0, timedOut: false });
  assert.deepEqual(master.valuesOf('unpause_at'), [120]);
});

test('buffer ready events reach the barrier through the engine', async () => {
  const h = createEngineHarness();
  const master = h.addPlayer('living', { state: 'buffer_ready', jiffies: 100 });
  const child = h.addPlayer('kitchen', { state: 'buffer_ready', jiffies: 200 });
  h.group('living', 'kitchen');

  h.engine.dispatch({ type: 'buffer_ready', playerId: 'living' });
  await h.engine.settle();

  assert.deepEqual(master.valuesOf('unpause_at'), [120]);
  assert.deepEqual(child.valuesOf('unpause_at'), [220]);
});
