import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '..';

describe('loadConfig', () => {
  it('applies defaults when only the API key is set', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(config.port).toBe(8000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.apiPrefix).toBe('');
    expect(config.ai).toEqual({ openaiApiKey: 'test-key', openaiBaseUrl: undefined, ttsModel: 'gpt-4o-mini-tts' });
    expect(config.voices).toEqual({
      profiles: {
        DR_ARJUN: { voice: 'onyx', speed: 1.0 },
        RIYA: { voice: 'nova', speed: 1.05 },
      },
      fallback: { voice: 'onyx', speed: 1 },
    });
    expect(config.storage).toEqual({
      outputDir: path.resolve(process.cwd(), 'generated_audio'),
      staticPath: '/audio',
      publicBaseUrl: 'http://localhost:8000',
      probeDuration: false,
    });
  });

  it('fails when the API key is missing or blank', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(/OPENAI_API_KEY/);
    expect(() => loadConfig({ OPENAI_API_KEY: '   ' })).toThrow(/OPENAI_API_KEY/);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      PORT: '9100',
      API_PREFIX: '/api/v1/',
      OPENAI_TTS_MODEL: 'tts-1-hd',
      AUDIO_STATIC_PATH: 'files/',
      PUBLIC_BASE_URL: 'https://audio.example.com/',
      AUDIO_PROBE_DURATION: 'true',
      DEFAULT_VOICE: 'alloy',
      DEFAULT_SPEED: '0.9',
    });

    expect(config.port).toBe(9100);
    expect(config.apiPrefix).toBe('/api/v1');
    expect(config.ai.ttsModel).toBe('tts-1-hd');
    expect(config.storage.staticPath).toBe('/files');
    expect(config.storage.publicBaseUrl).toBe('https://audio.example.com');
    expect(config.storage.probeDuration).toBe(true);
    expect(config.voices.fallback).toEqual({ voice: 'alloy', speed: 0.9 });
  });

  it('replaces the voice table from VOICE_PROFILES', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      VOICE_PROFILES: '{"riya":{"voice":"shimmer","speed":"1.2"},"mentor":{"voice":"echo"}}',
    });

    expect(config.voices.profiles).toEqual({
      RIYA: { voice: 'shimmer', speed: 1.2 },
      MENTOR: { voice: 'echo', speed: 1 },
    });
  });

  it('rejects malformed voice settings', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', VOICE_PROFILES: 'not json' })).toThrow(
      /VOICE_PROFILES is not valid JSON/
    );
    expect(() =>
      loadConfig({ OPENAI_API_KEY: 'test-key', VOICE_PROFILES: '{"RIYA":{"voice":"nova","speed":9}}' })
    ).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', DEFAULT_SPEED: '0.1' })).toThrow(/DEFAULT_SPEED/);
  });

  it('rejects voices the provider does not offer', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', DEFAULT_VOICE: 'baritone' })).toThrow(/DEFAULT_VOICE/);
    expect(() =>
      loadConfig({ OPENAI_API_KEY: 'test-key', VOICE_PROFILES: '{"RIYA":{"voice":"baritone"}}' })
    ).toThrow(/VOICE_PROFILES is invalid: RIYA\.voice/);
    expect(loadConfig({ OPENAI_API_KEY: 'test-key', DEFAULT_VOICE: 'verse' }).voices.fallback.voice).toBe('verse');
  });

  it('accepts only winston log levels', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });

  it('derives the public base URL from the port', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key', PORT: '3000' }).storage.publicBaseUrl).toBe(
      'http://localhost:3000'
    );
  });
});
