// src/audio/g711.ts
// G.711 mu-law codec plus the PCM16 resampler shared by both bridge directions.

export type AudioFormat =
  | { encoding: 'ulaw'; sampleRateHz: 8000 }
  | { encoding: 'pcm16'; sampleRateHz: number };

export const TELEPHONY_FORMAT: AudioFormat = { encoding: 'ulaw', sampleRateHz: 8000 };

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

function muLawToPcmSample(uLawByte: number): number {
  const u = ~uLawByte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  if (sign) sample = -sample;
  return clampInt16(sample);
}

function pcmToMuLawSample(pcm: number): number {
  let sample = clampInt16(pcm);
  const sign = (sample >> 8) & 0x80;
  if (sign) sample = -sample;
  if (sample > MULAW_CLIP) sample = MULAW_CLIP;
  sample += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (sample & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (sample >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function decodeMulaw(payload: Buffer): Int16Array {
  const out = new Int16Array(payload.length);
  for (let i = 0; i < payload.length; i += 1) out[i] = muLawToPcmSample(payload[i] ?? 0xff);
  return out;
}

export function encodeMulaw(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length);
  for (let i = 0; i < samples.length; i += 1) out[i] = pcmToMuLawSample(samples[i] ?? 0);
  return out;
}

export function resamplePcm16(input: Int16Array, inputRate: number, outputRate: number): Int16Array {
  if (inputRate <= 0 || outputRate <= 0 || input.length === 0) return input;
  if (inputRate === outputRate) return input;

  const outputLength = Math.max(1, Math.round(input.length * (outputRate / inputRate)));
  const output = new Int16Array(outputLength);
  const ratio = inputRate / outputRate;

  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.floor(position);
    const nextIndex = Math.min(index + 1, input.length - 1);
    const frac = position - index;
    const sample0 = input[index] ?? 0;
    const sample1 = input[nextIndex] ?? sample0;
    output[i] = clampInt16(Math.round(sample0 + (sample1 - sample0) * frac));
  }

  return output;
}

export function pcm16FromBuffer(buf: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(buf.length / 2));
  for (let i = 0; i < samples.length; i += 1) samples[i] = buf.readInt16LE(i * 2);
  return samples;
}

export function pcm16ToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) out.writeInt16LE(samples[i] ?? 0, i * 2);
  return out;
}

/** Accepts the conversational backend's names: `ulaw_8000`, `pcm_16000`, ... */
export function parseAudioFormat(raw: string | undefined): AudioFormat | null {
  if (!raw) return null;
  const value = raw.trim().toLowerCase();
  if (value === 'ulaw_8000' || value === 'pcmu' || value === 'mulaw') {
    return TELEPHONY_FORMAT;
  }
  const match = /^pcm_(\d+)$/.exec(value);
  if (match) {
    const rate = Number.parseInt(match[1] ?? '', 10);
    if (Number.isFinite(rate) && rate > 0) {
      return { encoding: 'pcm16', sampleRateHz: rate };
    }
  }
  return null;
}

export function formatName(format: AudioFormat): string {
  return format.encoding === 'ulaw' ? 'ulaw_8000' : `pcm_${format.sampleRateHz}`;
}

function toPcm16(buf: Buffer, format: AudioFormat): Int16Array {
  return format.encoding === 'ulaw' ? decodeMulaw(buf) : pcm16FromBuffer(buf);
}

function fromPcm16(samples: Int16Array, format: AudioFormat): Buffer {
  return format.encoding === 'ulaw' ? encodeMulaw(samples) : pcm16ToBuffer(samples);
}

export function transcode(buf: Buffer, from: AudioFormat, to: AudioFormat): Buffer {
  if (from.encoding === to.encoding && from.sampleRateHz === to.sampleRateHz) {
    return buf;
  }
  const pcm = toPcm16(buf, from);
  const resampled = resamplePcm16(pcm, from.sampleRateHz, to.sampleRateHz);
  return fromPcm16(resampled, to);
}
