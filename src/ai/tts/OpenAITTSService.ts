import OpenAI from 'openai';
import type { SpeechCreateParams } from 'openai/resources/audio/speech';
import { logger } from '../../config/logger';
import type { ITTSService, TTSOptions } from './types';
import { isOpenAIVoice } from './voices';

/** The slice of the OpenAI client this service calls. */
export interface SpeechClient {
    audio: {
        speech: {
            create(params: SpeechCreateParams): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
        };
    };
}

export interface OpenAITTSServiceOptions {
    apiKey: string;
    model: string;
    baseURL?: string;
}

export class OpenAITTSService implements ITTSService {
    private readonly client: SpeechClient;
    private readonly model: string;

    constructor(options: OpenAITTSServiceOptions, client?: SpeechClient) {
        this.model = options.model;
        this.client =
            client ??
            new OpenAI({
                apiKey: options.apiKey,
                baseURL: options.baseURL,
                // One attempt per line; a failed render is not retried.
                maxRetries: 0,
            });
    }

    async synthesize(text: string, options: TTSOptions): Promise<Buffer> {
        if (!isOpenAIVoice(options.voice)) {
            throw new Error(`Unsupported OpenAI voice: ${options.voice}`);
        }

        try {
            const response = await this.client.audio.speech.create({
                model: this.model,
                voice: options.voice,
                input: text,
                speed: options.speed,
                response_format: 'pcm',
            });

            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            logger.error('OpenAI TTS request failed', {
                voice: options.voice,
                chars: text.length,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }
}
