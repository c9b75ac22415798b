/**
 * Shared domain types for the conversation renderer.
 * Keeps API, services, and storage aligned on the same shapes.
 */

export interface DialogueSegment {
  /** Persona identifier, e.g. "DR_ARJUN" or "RIYA". Matched case-insensitively. */
  speaker: string;
  /** One line of dialogue. */
  text: string;
}

export interface RenderRequest {
  topic_id: string;
  segments: DialogueSegment[];
}

export interface VoiceProfile {
  /** Provider voice name, e.g. "onyx". */
  voice: string;
  /** Speaking rate; 1.0 is the provider's normal speed. */
  speed: number;
}

export interface RenderedTrack {
  /** Encoded bytes of the whole conversation. */
  audio: Buffer;
  durationMs: number;
  /** Number of segments that were synthesized (empty lines excluded). */
  segmentCount: number;
  /** MIME type of `audio`, taken from the encoder. */
  contentType: string;
}

export interface PersistedTrack {
  fileName: string;
  filePath: string;
  audioUrl: string;
  durationMs: number;
}

export interface RenderFileResponse {
  status: 'success';
  audio_url: string;
  file_name: string;
  duration_ms?: number;
}
