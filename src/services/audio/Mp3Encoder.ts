import lamejs from 'lamejs';

export interface AudioEncoder {
  /** MIME type of the encoded output. */
  readonly contentType: string;
  encode(samples: Int16Array, sampleRate: number): Buffer;
}

/** Input chunk size fed to lamejs per call. */
const FRAME_SAMPLES = 1152;

/** lamejs reuses its output buffer between calls, so every chunk is copied. */
function copyChunk(chunk: Int8Array): Buffer {
  return Buffer.from(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
}

/** Mono MP3 encoder on top of lamejs. */
export class Mp3Encoder implements AudioEncoder {
  readonly contentType = 'audio/mpeg';

  constructor(private readonly kbps = 128) {}

  encode(samples: Int16Array, sampleRate: number): Buffer {
    const encoder = new lamejs.Mp3Encoder(1, sampleRate, this.kbps);
    const chunks: Buffer[] = [];

    for (let offset = 0; offset < samples.length; offset += FRAME_SAMPLES) {
      const frame = encoder.encodeBuffer(samples.subarray(offset, offset + FRAME_SAMPLES));
      if (frame.length > 0) chunks.push(copyChunk(frame));
    }
    const tail = encoder.flush();
    if (tail.length > 0) chunks.push(copyChunk(tail));

    return Buffer.concat(chunks);
  }
}
