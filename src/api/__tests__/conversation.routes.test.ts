import { promises as fs } from 'fs';
import type { Server } from 'http';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app';
import { loadConfig } from '../../config';
import { createConversationRenderer } from '../../services/conversation';
import { FakeTTSService, MITOSIS_REQUEST } from '../../services/conversation/__tests__/fakes';

const fileResponseSchema = z.object({ audio_url: z.string(), file_name: z.string() });

describe('render-conversation routes', () => {
  let outputDir: string;
  let server: Server;
  let baseUrl: string;
  let tts: FakeTTSService;

  beforeAll(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'routes-test-'));
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      AUDIO_OUTPUT_DIR: outputDir,
      PUBLIC_BASE_URL: 'http://audio.test',
    });
    tts = new FakeTTSService();
    const { renderer } = createConversationRenderer(config, tts);
    const app = createApp(config, renderer);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    tts.calls.length = 0;
    tts.failure = null;
  });

  function post(route: string, payload: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('returns the rendered MP3 bytes', async () => {
    const res = await post('/render-conversation', MITOSIS_REQUEST);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('audio/mpeg');
    expect(res.headers.get('x-audio-duration-ms')).toBe('1500');
    const audio = Buffer.from(await res.arrayBuffer());
    expect(audio.length).toBeGreaterThan(0);
    expect(audio[0]).toBe(0xff);
  });

  it('renders the mitosis dialogue to a served file', async () => {
    const res = await post('/render-conversation/file', MITOSIS_REQUEST);

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ status: 'success', duration_ms: 1500 });
    expect(tts.calls).toEqual([
      { text: "Let's begin.", voice: 'onyx', speed: 1.0 },
      { text: 'Wait, I have a question.', voice: 'nova', speed: 1.05 },
    ]);

    const { audio_url: audioUrl, file_name: fileName } = fileResponseSchema.parse(body);
    expect(fileName).toMatch(/^mitosis_[0-9a-f]{8}\.mp3$/);
    expect(audioUrl).toBe(`http://audio.test/audio/${fileName}`);

    const onDisk = await fs.readFile(path.join(outputDir, fileName));
    const served = await fetch(`${baseUrl}/audio/${fileName}`);
    expect(served.status).toBe(200);
    expect(served.headers.get('content-type')).toMatch(/^audio\/mpeg/);
    expect(Buffer.from(await served.arrayBuffer()).equals(onDisk)).toBe(true);
  });

  it('rejects an empty segment list without calling the provider', async () => {
    const res = await post('/render-conversation', { topic_id: 'mitosis', segments: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No segments provided' });
    expect(tts.calls).toHaveLength(0);
  });

  it('reports a server error when every line is blank', async () => {
    const res = await post('/render-conversation/file', {
      topic_id: 'mitosis',
      segments: [{ speaker: 'RIYA', text: '' }],
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Render failed: No audio generated from segments' });
    expect(tts.calls).toHaveLength(0);
  });

  it('wraps provider failures in a 500', async () => {
    tts.failure = { onCall: 0, error: new Error('quota exceeded') };

    const res = await post('/render-conversation', MITOSIS_REQUEST);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Render failed: Speech synthesis failed for segment 0: quota exceeded',
    });
    expect(tts.calls).toHaveLength(1);
  });

  it('validates the request body', async () => {
    const res = await post('/render-conversation', { segments: [{ speaker: 'RIYA', text: 42 }] });

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      error: 'Validation failed',
      details: expect.arrayContaining([
        { field: 'topic_id', message: 'topic_id must be a string' },
        { field: 'segments[0].text', message: 'text must be a string' },
      ]),
    });
    expect(tts.calls).toHaveLength(0);
  });

  it('rejects malformed JSON with a client error', async () => {
    const res = await fetch(`${baseUrl}/render-conversation`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"topic_id":',
    });
    expect(res.status).toBe(400);
  });
});
