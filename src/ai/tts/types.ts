/**
 * Text-to-Speech abstraction for dialogue lines. Implemented with OpenAI TTS;
 * the interface allows pluggable backends and in-process fakes in tests.
 */

export interface TTSOptions {
  voice: string;
  speed: number;
}

export interface ITTSService {
  /**
   * Synthesize one utterance. Resolves with raw PCM: signed 16-bit
   * little-endian, mono, at `TTS_SAMPLE_RATE`.
   */
  synthesize(text: string, options: TTSOptions): Promise<Buffer>;
}

/** Sample rate of the PCM the OpenAI speech endpoint returns. */
export const TTS_SAMPLE_RATE = 24_000;
