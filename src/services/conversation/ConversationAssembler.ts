/**
 * Conversation Assembler: synthesizes each dialogue line in order, decodes the
 * clips to PCM and lays them out on one track with silence between lines,
 * then fades the whole track and encodes it once.
 */

import { logger } from '../../config/logger';
import type { ITTSService } from '../../ai/tts';
import { TTS_SAMPLE_RATE } from '../../ai/tts';
import type { DialogueSegment, RenderedTrack } from '../../types';
import type { AudioEncoder } from '../audio/Mp3Encoder';
import { applyFades, concatSamples, decodePcm16, samplesToMs, silence } from '../audio/pcm';
import { NoAudioGeneratedError, SynthesisError } from './errors';
import type { VoiceProfileResolver } from './VoiceProfileResolver';

export interface AssemblyPolicy {
  leadingSilenceMs: number;
  pauseMs: number;
  /** Pause after a line containing one of `emotionalKeywords`. */
  emotionalPauseMs: number;
  emotionalKeywords: readonly string[];
  fadeInMs: number;
  fadeOutMs: number;
}

export const DEFAULT_ASSEMBLY_POLICY: AssemblyPolicy = {
  leadingSilenceMs: 500,
  pauseMs: 300,
  emotionalPauseMs: 500,
  emotionalKeywords: ['honestly', 'ahh', 'umm', 'wait', 'sir', 'hmm'],
  fadeInMs: 1200,
  fadeOutMs: 1500,
};

/** Substring match on the lower-cased line, so "waiting" counts as "wait". */
export function pauseAfter(text: string, policy: AssemblyPolicy = DEFAULT_ASSEMBLY_POLICY): number {
  const lowered = text.toLowerCase();
  const emotional = policy.emotionalKeywords.some((keyword) => lowered.includes(keyword));
  return emotional ? policy.emotionalPauseMs : policy.pauseMs;
}

export class ConversationAssembler {
  constructor(
    private readonly tts: ITTSService,
    private readonly voices: VoiceProfileResolver,
    private readonly encoder: AudioEncoder,
    private readonly policy: AssemblyPolicy = DEFAULT_ASSEMBLY_POLICY,
    private readonly sampleRate: number = TTS_SAMPLE_RATE
  ) {}

  /**
   * Build the raw track. Lines are synthesized one after another; the first
   * provider failure aborts the render.
   */
  async assembleSamples(segments: readonly DialogueSegment[]): Promise<{ samples: Int16Array; clipCount: number }> {
    const parts: Int16Array[] = [silence(this.policy.leadingSilenceMs, this.sampleRate)];
    let clipCount = 0;

    for (const [index, segment] of segments.entries()) {
      const text = segment.text.trim();
      if (!text) continue;

      const profile = this.voices.resolve(segment.speaker);
      logger.debug('Synthesizing segment', { index, speaker: segment.speaker, voice: profile.voice });

      let pcm: Buffer;
      try {
        pcm = await this.tts.synthesize(text, profile);
      } catch (error) {
        throw new SynthesisError(index, error);
      }

      parts.push(decodePcm16(pcm), silence(pauseAfter(text, this.policy), this.sampleRate));
      clipCount++;
    }

    if (clipCount === 0) {
      throw new NoAudioGeneratedError();
    }

    return { samples: concatSamples(parts), clipCount };
  }

  async assemble(segments: readonly DialogueSegment[]): Promise<RenderedTrack> {
    const { samples, clipCount } = await this.assembleSamples(segments);
    const faded = applyFades(samples, this.sampleRate, this.policy.fadeInMs, this.policy.fadeOutMs);

    return {
      audio: this.encoder.encode(faded, this.sampleRate),
      durationMs: samplesToMs(faded.length, this.sampleRate),
      segmentCount: clipCount,
      contentType: this.encoder.contentType,
    };
  }
}
