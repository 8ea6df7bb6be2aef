import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { prevStateKey } from '../../src/application/sync/groupCommandDispatcher';
import { createEngineHarness, type EngineHarness } from '../fakes/engineHarness';
import { queueItem } from '../fakes/collaborators';

function livingGroup(): EngineHarness {
  const h = createEngineHarness();
  h.addPlayer('living', { state: 'playing' });
  h.addPlayer('kitchen', { state: 'idle', supportedCodecs: ['pcm'] });
  h.addPlayer('office', { state: 'playing' });
  h.group('living', 'kitchen', 'office');
  return h;
}

test('stop reaches every member that is not idle', async () => {
  const h = livingGroup();
  const result = await h.engine.commands.stop('living');
  assert.deepEqual(result, { sent: ['living', 'office'], skipped: ['kitchen'], failed: [] });
});

test('a failing member does not stop the fan-out', async () => {
  const h = livingGroup();
  const office = h.addPlayer('office', { state: 'playing' });
  h.group('living', 'office');
  office.failWith = new Error('socket closed');

  const result = await h.engine.commands.pause('living');

  assert.deepEqual(result, { sent: ['living'], skipped: ['kitchen'], failed: ['office'] });
  assert.deepEqual(office.commands(), ['pause']);
});

test('play only resumes members that can start', async () => {
  const h = createEngineHarness();
  const living = h.addPlayer('living', { state: 'paused' });
  const kitchen = h.addPlayer('kitchen', { state: 'buffer_ready' });
  const office = h.addPlayer('office', { state: 'playing' });
  h.group('living', 'kitchen', 'office');

  const result = await h.engine.commands.play('living');

  assert.deepEqual(result, { sent: ['living', 'kitchen'], skipped: ['office'], failed: [] });
  assert.deepEqual(living.commands(), ['play']);
  assert.deepEqual(kitchen.commands(), ['play']);
  assert.deepEqual(office.calls, []);
});

test('a command addressed to a child stays with the child', async () => {
  const h = livingGroup();
  const result = await h.engine.commands.pause('office');
  assert.deepEqual(result, { sent: ['office'], skipped: [], failed: [] });
});

test('volume changes are clamped and remembered', async () => {
  const h = createEngineHarness();
  const office = h.addPlayer('office', {}, { powered: true });

  assert.equal(await h.engine.commands.volumeSet('office', 150), true);
  assert.deepEqual(office.valuesOf('volume_set'), [100]);
  assert.deepEqual(h.cache.entries.get(prevStateKey('office')), [true, 100]);
  assert.equal(prevStateKey('office'), 'slimsync_prev_state.office');

  assert.equal(await h.engine.commands.volumeSet('garage', 10), false);
  assert.equal(h.cache.entries.has(prevStateKey('garage')), false);
});

test('power updates the record and remembers the current volume', async () => {
  const h = createEngineHarness();
  const office = h.addPlayer('office', { volumeLevel: 35 });

  assert.equal(await h.engine.commands.power('office', true), true);

  assert.equal(h.player('office').powered, true);
  assert.deepEqual(office.calls, [{ command: 'power', powered: true }]);
  assert.deepEqual(h.cache.entries.get(prevStateKey('office')), [true, 35]);
});

test('mute reaches the player and updates the record', async () => {
  const h = createEngineHarness();
  const office = h.addPlayer('office');
  const updated: string[] = [];
  h.registry.onPlayerUpdated((player) => updated.push(player.id));

  assert.equal(await h.engine.commands.volumeMute('office', true), true);
  assert.deepEqual(office.calls, [{ command: 'mute', muted: true }]);
  assert.equal(h.player('office').volumeMuted, true);
  assert.deepEqual(updated, ['office']);

  office.failWith = new Error('socket closed');
  assert.equal(await h.engine.commands.volumeMute('office', false), false);
  assert.equal(h.player('office').volumeMuted, true);
  assert.equal(await h.engine.commands.volumeMute('garage', true), false);
});

test('a failed power command leaves the record alone', async () => {
  const h = createEngineHarness();
  const office = h.addPlayer('office');
  office.failWith = new Error('socket closed');

  assert.equal(await h.engine.commands.power('office', true), false);
  assert.equal(h.player('office').powered, false);
  assert.equal(h.cache.entries.size, 0);
});

test('a synced child cannot start media itself', async () => {
  const h = livingGroup();
  await assert.rejects(h.engine.commands.playMedia('kitchen', queueItem('item-1', 'queue-living')), {
    name: 'SyncPreconditionError',
    message: 'A synced player cannot receive play commands directly',
  });
  await assert.rejects(h.engine.commands.playMedia('garage', queueItem('item-1', 'queue-garage')), {
    message: 'Unknown player',
  });
  assert.equal(h.streams.created.length, 0);
});

test('a master plays media through one shared stream job', async () => {
  const h = createEngineHarness();
  const living = h.addPlayer('living', { state: 'playing' });
  const kitchen = h.addPlayer('kitchen', { supportedCodecs: ['pcm'] });
  h.group('living', 'kitchen');
  const item = queueItem('item-1', 'queue-living');

  await h.engine.commands.playMedia('living', item, 1500.7);

  assert.deepEqual(h.streams.created, [{ queueId: 'queue-living', item, seekMs: 1500, fadeIn: false }]);
  assert.deepEqual(living.urlCalls(), [
    {
      url: 'http://stream.test/job-1/living.flac',
      options: {
        mimeType: 'audio/flac',
        crossfade: false,
        transitionDurationSec: 0,
        metadata: { item_id: 'flow', title: 'slimsync' },
        flush: true,
        autostart: false,
      },
    },
  ]);
  assert.deepEqual(kitchen.urlCalls(), [
    {
      url: 'http://stream.test/job-1/kitchen.pcm',
      options: {
        mimeType: 'audio/pcm',
        crossfade: false,
        transitionDurationSec: 0,
        metadata: { item_id: 'flow', title: 'slimsync' },
        flush: true,
        autostart: false,
      },
    },
  ]);
});

test('a single player plays media directly with autostart', async () => {
  const h = createEngineHarness({ players: { office: { crossfade: true, crossfadeDuration: 5 } } });
  const office = h.addPlayer('office');

  await h.engine.commands.playMedia('office', queueItem('item-1', 'queue-office', { artist: 'Test Artist' }));

  assert.equal(h.streams.created.length, 0);
  assert.deepEqual(office.urlCalls(), [
    {
      url: 'http://stream.test/item/item-1.flac',
      options: {
        mimeType: 'audio/flac',
        crossfade: true,
        transitionDurationSec: 5,
        metadata: {
          item_id: 'item-1',
          title: 'Track item-1',
          artist: 'Test Artist',
          album: '',
          image_url: '',
          duration: 0,
        },
        flush: true,
        autostart: true,
      },
    },
  ]);
});

test('playing media cancels a pending group restart', async () => {
  const h = createEngineHarness();
  h.addPlayer('living', { state: 'playing' });
  h.addPlayer('kitchen');
  h.queues.setQueue('living', { queueId: 'queue-living', state: 'playing' });
  h.engine.groups.sync('kitchen', 'living');

  await h.engine.commands.playMedia('living', queueItem('item-2', 'queue-living'));
  h.clock.advance(1000);

  assert.deepEqual(h.queues.resumeCalls, []);
});

test('an existing stream job falls back to mp3 for players without flac', async () => {
  const h = createEngineHarness();
  const living = h.addPlayer('living');
  const kitchen = h.addPlayer('kitchen', { supportedCodecs: ['pcm', 'mp3'] });
  h.group('living', 'kitchen');

  await h.engine.commands.playStream('living', { jobId: 'job-9', queueId: 'queue-living' });

  assert.deepEqual(
    living.urlCalls().map((call) => call.url),
    ['http://stream.test/job-9/living.flac'],
  );
  assert.deepEqual(
    kitchen.urlCalls().map((call) => [call.url, call.options.mimeType]),
    [['http://stream.test/job-9/kitchen.mp3', 'audio/mpeg']],
  );
});

test('enqueue next appends without flushing', async () => {
  const h = createEngineHarness();
  const office = h.addPlayer('office', { supportedCodecs: ['pcm'] });

  await h.engine.commands.enqueueNext('office', queueItem('item-3', 'queue-office'));

  const calls = office.urlCalls();
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'http://stream.test/item/item-3.pcm');
  assert.equal(calls[0].options.enqueue, true);
  assert.equal(calls[0].options.flush, false);
  assert.equal(calls[0].options.autostart, true);
  assert.equal(calls[0].options.mimeType, 'audio/pcm');
});
