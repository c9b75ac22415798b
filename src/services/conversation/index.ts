import type { AppConfig } from '../../config';
import { createTTSService, type ITTSService } from '../../ai/tts';
import { Mp3Encoder } from '../audio/Mp3Encoder';
import { AudioFileStore } from '../storage/AudioFileStore';
import { ConversationAssembler } from './ConversationAssembler';
import { ConversationRenderer } from './ConversationRenderer';
import { VoiceProfileResolver } from './VoiceProfileResolver';

/** Wire the renderer from configuration. Tests pass their own TTS service. */
export function createConversationRenderer(
  config: AppConfig,
  tts: ITTSService = createTTSService(config)
): { renderer: ConversationRenderer; store: AudioFileStore } {
  const voices = new VoiceProfileResolver(config.voices.profiles, config.voices.fallback);
  const assembler = new ConversationAssembler(tts, voices, new Mp3Encoder());
  const store = new AudioFileStore({
    outputDir: config.storage.outputDir,
    staticPath: config.storage.staticPath,
    publicBaseUrl: config.storage.publicBaseUrl,
    probeDuration: config.storage.probeDuration,
  });
  return { renderer: new ConversationRenderer(assembler, store), store };
}
