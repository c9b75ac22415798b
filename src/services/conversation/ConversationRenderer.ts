import { logger } from '../../config/logger';
import type { PersistedTrack, RenderedTrack, RenderRequest } from '../../types';
import type { AudioFileStore } from '../storage/AudioFileStore';
import type { ConversationAssembler } from './ConversationAssembler';
import { InvalidRenderRequestError } from './errors';

/**
 * Entry point for a render: checks the request, assembles the track and,
 * for the file variant, persists it.
 */
export class ConversationRenderer {
  constructor(
    private readonly assembler: ConversationAssembler,
    private readonly store: AudioFileStore
  ) {}

  async render(request: RenderRequest): Promise<RenderedTrack> {
    if (request.segments.length === 0) {
      throw new InvalidRenderRequestError('No segments provided');
    }

    const startedAt = Date.now();
    logger.info('Rendering conversation', {
      topicId: request.topic_id,
      segments: request.segments.length,
    });

    const track = await this.assembler.assemble(request.segments);

    logger.info('Conversation rendered', {
      topicId: request.topic_id,
      synthesized: track.segmentCount,
      durationMs: track.durationMs,
      bytes: track.audio.length,
      elapsedMs: Date.now() - startedAt,
    });
    return track;
  }

  async renderToFile(request: RenderRequest): Promise<PersistedTrack> {
    const track = await this.render(request);
    const saved = await this.store.save(track.audio, request.topic_id, track.durationMs);
    logger.info('Conversation audio saved', { topicId: request.topic_id, fileName: saved.fileName });
    return saved;
  }
}
