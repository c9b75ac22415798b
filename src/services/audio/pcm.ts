/**
 * Helpers over mono signed 16-bit PCM. Every function returns a new array;
 * inputs are never mutated.
 */

const BYTES_PER_SAMPLE = 2;

export function msToSamples(ms: number, sampleRate: number): number {
  return Math.max(0, Math.round((ms / 1000) * sampleRate));
}

export function samplesToMs(samples: number, sampleRate: number): number {
  return Math.round((samples / sampleRate) * 1000);
}

/** Decode little-endian 16-bit PCM bytes. A trailing odd byte is dropped. */
export function decodePcm16(bytes: Buffer): Int16Array {
  const count = Math.floor(bytes.length / BYTES_PER_SAMPLE);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = bytes.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

export function silence(ms: number, sampleRate: number): Int16Array {
  return new Int16Array(msToSamples(ms, sampleRate));
}

export function concatSamples(parts: readonly Int16Array[]): Int16Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Linear fade-in over the first `fadeInMs` and fade-out over the last
 * `fadeOutMs`. Each fade is clamped to the track length.
 */
export function applyFades(
  samples: Int16Array,
  sampleRate: number,
  fadeInMs: number,
  fadeOutMs: number
): Int16Array {
  const out = Int16Array.from(samples);
  const n = out.length;

  const fadeIn = Math.min(msToSamples(fadeInMs, sampleRate), n);
  for (let i = 0; i < fadeIn; i++) {
    out[i] = Math.round(out[i] * (i / fadeIn));
  }

  const fadeOut = Math.min(msToSamples(fadeOutMs, sampleRate), n);
  for (let i = 0; i < fadeOut; i++) {
    const index = n - fadeOut + i;
    out[index] = Math.round(out[index] * ((fadeOut - 1 - i) / fadeOut));
  }

  return out;
}
