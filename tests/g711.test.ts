import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('mu-law decodes silence and the extremes', async () => {
  const { decodeMulaw } = await import('../src/audio/g711');

  assert.deepEqual(Array.from(decodeMulaw(Buffer.from([0xff, 0x00, 0x80]))), [0, -32124, 32124]);
});

test('mu-law encodes silence and clips full scale', async () => {
  const { encodeMulaw } = await import('../src/audio/g711');

  assert.deepEqual([...encodeMulaw(Int16Array.from([0, 32767, -32768]))], [0xff, 0x80, 0x00]);
});

test('mu-law extremes survive a decode and re-encode', async () => {
  const { decodeMulaw, encodeMulaw } = await import('../src/audio/g711');

  assert.deepEqual([...encodeMulaw(decodeMulaw(Buffer.from([0x00, 0x80, 0xff])))], [0x00, 0x80, 0xff]);
});

test('resamplePcm16 interpolates linearly in both directions', async () => {
  const { resamplePcm16 } = await import('../src/audio/g711');

  assert.deepEqual(Array.from(resamplePcm16(Int16Array.from([0, 100]), 8000, 16000)), [0, 50, 100, 100]);
  assert.deepEqual(Array.from(resamplePcm16(Int16Array.from([0, 50, 100, 100]), 16000, 8000)), [0, 100]);
});

test('transcode turns one telephony frame into 20ms of 16kHz PCM', async () => {
  const { transcode, TELEPHONY_FORMAT } = await import('../src/audio/g711');

  const frame = Buffer.alloc(160, 0xff);
  const pcm = transcode(frame, TELEPHONY_FORMAT, { encoding: 'pcm16', sampleRateHz: 16000 });

  assert.equal(pcm.length, 640);
  assert.equal(pcm.every((byte) => byte === 0), true);
  assert.equal(transcode(frame, TELEPHONY_FORMAT, TELEPHONY_FORMAT), frame);
});

test('parseAudioFormat understands backend format names', async () => {
  const { parseAudioFormat, formatName } = await import('../src/audio/g711');

  assert.deepEqual(parseAudioFormat('ulaw_8000'), { encoding: 'ulaw', sampleRateHz: 8000 });
  assert.deepEqual(parseAudioFormat(' PCM_22050 '), { encoding: 'pcm16', sampleRateHz: 22050 });
  assert.equal(parseAudioFormat('opus_48000'), null);
  assert.equal(parseAudioFormat(undefined), null);
  assert.equal(formatName({ encoding: 'pcm16', sampleRateHz: 16000 }), 'pcm_16000');
});

test('bounded frame queue evicts the oldest entries', async () => {
  const { BoundedFrameQueue } = await import('../src/audio/frameQueue');
  const queue = new BoundedFrameQueue<string>(2);

  assert.equal(queue.push('a'), 0);
  assert.equal(queue.push('b'), 0);
  assert.equal(queue.push('c'), 1);
  assert.equal(queue.dropped, 1);
  assert.equal(queue.shift(), 'b');
  assert.equal(queue.clear(), 1);
  assert.equal(queue.length, 0);
});
