import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { test } from './testHarness';
import { isPlayerError, type PlayerErrorCode } from '../src/domain/playback/errors';
import { TEMP_DIR_NAME, TransferPipeline } from '../src/application/media/transferPipeline';
import { systemClock } from '../src/infrastructure/time/systemClock';
import { settlesWithin } from '../src/shared/utils/wait';
import { createPlayerHarness, type PlayerHarness, type PlayerHarnessOptions } from './fakes/playerHarness';

async function withPlayer(
  options: PlayerHarnessOptions,
  fn: (harness: PlayerHarness) => Promise<void>,
): Promise<void> {
  const harness = await createPlayerHarness(options);
  try {
    await fn(harness);
  } finally {
    await harness.cleanup();
  }
}

function failsWith(code: PlayerErrorCode) {
  return (error: unknown): boolean => {
    assert.ok(isPlayerError(error), `expected PlayerError, got ${String(error)}`);
    assert.equal(error.code, code);
    return true;
  };
}

async function tempEntries(h: PlayerHarness): Promise<string[]> {
  try {
    return await fs.readdir(path.join(h.mediaDir, TEMP_DIR_NAME));
  } catch {
    return [];
  }
}

test('upload streams into place and shows up in the listing', async () => {
  await withPlayer({}, async (h) => {
    const payload = Buffer.alloc(20_000, 7);
    const handle = await h.player.beginUpload('new.mkv', payload.length);
    assert.deepEqual(h.transfers.list().map((job) => job.name), ['new.mkv']);
    await h.player.receiveUpload(handle, Readable.from([payload.subarray(0, 12_000), payload.subarray(12_000)]));
    const file = await h.player.completeUpload(handle);

    assert.equal(file.name, 'new.mkv');
    assert.equal(file.size, 20_000);
    assert.deepEqual(await fs.readFile(path.join(h.mediaDir, 'new.mkv')), payload);
    assert.deepEqual(await tempEntries(h), []);
    assert.equal(h.transfers.activeCount(), 0);
    assert.deepEqual((await h.player.listMedia()).map((entry) => entry.name), ['new.mkv']);
  });
});

test('upload replaces an existing file of the same name', async () => {
  await withPlayer({}, async (h) => {
    await h.addMedia('clip.mp4', 10);
    const handle = await h.player.beginUpload('clip.mp4', 3);
    await h.player.writeChunk(handle, Buffer.from('abc'));
    await h.player.completeUpload(handle);
    assert.equal(await fs.readFile(path.join(h.mediaDir, 'clip.mp4'), 'utf8'), 'abc');
  });
});

test('short upload is discarded with transfer-failed', async () => {
  await withPlayer({}, async (h) => {
    const handle = await h.player.beginUpload('short.mp4', 100);
    await h.player.writeChunk(handle, Buffer.alloc(50));
    await assert.rejects(h.player.completeUpload(handle), (error: unknown) => {
      assert.ok(isPlayerError(error, 'transfer-failed'));
      assert.equal(error.message, 'Upload incomplete: received 50 of 100 bytes');
      return true;
    });
    assert.deepEqual(await tempEntries(h), []);
    await assert.rejects(fs.access(path.join(h.mediaDir, 'short.mp4')));
    assert.equal(h.transfers.isTransferring('short.mp4'), false);
  });
});

test('writing past the declared size fails the upload', async () => {
  await withPlayer({}, async (h) => {
    const handle = await h.player.beginUpload('long.mp4', 4);
    await assert.rejects(h.player.writeChunk(handle, Buffer.alloc(5)), failsWith('transfer-failed'));
    assert.deepEqual(await tempEntries(h), []);
    await assert.rejects(h.player.completeUpload(handle), failsWith('transfer-failed'));
  });
});

test('uploads over the size limit are refused', async () => {
  await withPlayer({ maxUploadSize: 1000 }, async (h) => {
    await assert.rejects(h.player.beginUpload('big.mp4', 1001), (error: unknown) => {
      assert.ok(isPlayerError(error, 'payload-too-large'));
      assert.equal(error.message, 'File too large. Maximum size is 1000 bytes');
      return true;
    });
    const handle = await h.player.beginUpload('undeclared.mp4', null);
    await h.player.writeChunk(handle, Buffer.alloc(600));
    await assert.rejects(h.player.writeChunk(handle, Buffer.alloc(600)), failsWith('payload-too-large'));
    assert.deepEqual(await tempEntries(h), []);
  });
});

test('one writer per name and unsafe names are refused', async () => {
  await withPlayer({}, async (h) => {
    const handle = await h.player.beginUpload('same.mp4', 10);
    await assert.rejects(h.player.beginUpload('same.mp4', 10), failsWith('transfer-conflict'));
    await assert.rejects(h.player.deleteMedia('same.mp4'), failsWith('transfer-conflict'));
    await assert.rejects(h.player.beginUpload('../same.mp4', 10), failsWith('invalid-filename'));
    await assert.rejects(h.player.beginUpload('same.exe', 10), failsWith('invalid-filename'));
    await assert.rejects(h.player.beginUpload('ok.mp4', -1), failsWith('validation-error'));

    await h.player.abortUpload(handle, 'test abort');
    await h.player.abortUpload(handle, 'aborted twice');
    const again = await h.player.beginUpload('same.mp4', 0);
    const file = await h.player.completeUpload(again);
    assert.equal(file.size, 0);
  });
});

test('stale temp files from an earlier run are purged', async () => {
  await withPlayer({}, async (h) => {
    const tempDir = path.join(h.mediaDir, TEMP_DIR_NAME);
    await fs.mkdir(tempDir, { recursive: true });
    await fs.writeFile(path.join(tempDir, 'old-1.part'), 'x');
    await fs.writeFile(path.join(tempDir, 'old-2.part'), 'y');
    assert.equal(await h.transfers.purgeStale(), 2);
    assert.deepEqual(await fs.readdir(tempDir), []);
    assert.equal(await h.transfers.purgeStale(), 0);
  });
});

test('completed uploads carry the probed duration when available', async () => {
  await withPlayer({}, async (h) => {
    const probed = new TransferPipeline({
      library: h.library,
      maxUploadSize: () => 1000,
      clock: systemClock,
      probe: { probeDuration: async () => 12.5 },
    });
    const handle = await probed.begin('timed.mp4', 1);
    await probed.write(handle, Buffer.from('x'));
    assert.equal((await probed.complete(handle)).duration, 12.5);

    const broken = new TransferPipeline({
      library: h.library,
      maxUploadSize: () => 1000,
      clock: systemClock,
      probe: {
        probeDuration: async () => {
          throw new Error('unreadable container');
        },
      },
    });
    const second = await broken.begin('untimed.mp4', 1);
    await broken.write(second, Buffer.from('x'));
    const file = await broken.complete(second);
    assert.equal(file.name, 'untimed.mp4');
    assert.equal(file.duration, undefined);
  });
});

test('listing skips hidden, foreign and temp entries', async () => {
  await withPlayer({}, async (h) => {
    await h.addMedia('b.webm');
    await h.addMedia('a.mp4', 3);
    await h.addMedia('.hidden.mp4');
    await fs.writeFile(path.join(h.mediaDir, 'notes.txt'), 'x');
    await fs.mkdir(path.join(h.mediaDir, 'folder.mp4'));
    const pending = await h.player.beginUpload('pending.mp4', 10);
    const files = await h.player.listMedia();
    assert.deepEqual(files.map((file) => file.name), ['a.mp4', 'b.webm']);
    assert.equal(files[0]?.size, 3);
    await h.player.abortUpload(pending, 'test finished');
  });
});

test('a seek during a large upload is not held up by it', async () => {
  await withPlayer({ maxUploadSize: 64 * 1024 * 1024 }, async (h) => {
    await h.addMedia('a.mp4');
    await h.player.startSession('a.mp4');
    const chunk = Buffer.alloc(256 * 1024, 3);
    const chunks = 64;
    const handle = await h.player.beginUpload('large.mp4', chunk.length * chunks);
    const upload = (async () => {
      for (let i = 0; i < chunks; i += 1) {
        await h.player.writeChunk(handle, chunk);
      }
      return h.player.completeUpload(handle);
    })();

    const seek = h.player.seek(45);
    assert.equal(await settlesWithin(seek, 2000), true);
    assert.equal((await seek).position, 45);
    const file = await upload;
    assert.equal(file.size, chunk.length * chunks);
  });
});
