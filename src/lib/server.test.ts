import type http from 'http';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { PipelineCoordinator } from './coordinator';
import { RetryingForwarder } from './forwarder';
import { silentLogger } from './log';
import { closeServer, createRelayServer, listen } from './server';
import type { AnnotatedArtifact, CaptureEvent, PublishOutcome } from './types';

let root: string;
let server: http.Server;
let base: string;
let coordinator: PipelineCoordinator;

const RecordBody = z.object({ record: z.object({ event_id: z.string() }) });

function fakeAnnotator() {
  return {
    annotate: vi.fn(
      async (event: CaptureEvent): Promise<AnnotatedArtifact> => ({
        path: event.imagePath.replace(/\.jpg$/, '_ann.jpg'),
        width: 64,
        height: 48,
        boxCount: 1,
        source: 'local',
      })
    ),
  };
}

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-server-'));
  await fs.mkdir(path.join(root, 'run1'));
  await fs.writeFile(path.join(root, 'run1', 'frame001.jpg'), 'x');
  await fs.utimes(path.join(root, 'run1', 'frame001.jpg'), 1_000, 1_000);
  await fs.writeFile(path.join(root, 'run1', 'frame002.jpg'), 'x');
  await fs.utimes(path.join(root, 'run1', 'frame002.jpg'), 2_000, 2_000);

  coordinator = new PipelineCoordinator({
    prompts: { name: 'prompts', call: async (caption) => (caption.text.includes('chair') ? ['red chair'] : []) },
    detector: {
      name: 'detection',
      call: async () => ({ boxes: [{ label: 'red chair', score: 0.82, bbox: [1, 2, 30, 40] }] }),
    },
    annotator: fakeAnnotator(),
    publisher: { publish: async (): Promise<PublishOutcome> => ({ ok: true, skipped: false, deliveries: [] }) },
    forwarder: new RetryingForwarder({ logger: silentLogger, sleep: async () => undefined }),
    promptPolicy: { perAttemptTimeoutMs: 1000, maxAttempts: 1 },
    detectionPolicy: { perAttemptTimeoutMs: 1000, maxAttempts: 1 },
    writeSidecar: null,
    logger: silentLogger,
  });
  server = createRelayServer({ coordinator, capturesRoot: root, logger: silentLogger, maxBodyBytes: 4096 });
  const port = await listen(server, 0, '127.0.0.1');
  base = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await closeServer(server);
  await coordinator.close();
  await fs.rm(root, { recursive: true, force: true });
});

function postJson(route: string, body: unknown) {
  return fetch(`${base}${route}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('relay server', () => {
  it('reports health without touching downstream services', async () => {
    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, in_flight: 0, queued: 0 });
  });

  it('processes an event and returns the record when asked to wait', async () => {
    const res = await postJson('/events?wait=1', { image_path: 'run1/frame001.jpg', caption: 'a red chair', event_id: 'evt-1' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      record: {
        event_id: 'evt-1',
        status: 'published',
        state: 'Published',
        image_path: path.join(root, 'run1', 'frame001.jpg'),
        objects: ['red chair'],
        artifact_path: path.join(root, 'run1', 'frame001_ann.jpg'),
      },
    });
  });

  it('accepts an event and serves its status', async () => {
    const res = await postJson('/events', { image_path: 'run1/frame001.jpg', caption: 'a red chair', event_id: 'evt-2' });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ ok: true, event_id: 'evt-2', status_url: '/events/evt-2' });

    await vi.waitFor(async () => {
      const status = await fetch(`${base}/events/evt-2`);
      expect(await status.json()).toMatchObject({ ok: true, record: { status: 'published' } });
    });
  });

  it('derives a stable id when none is given', async () => {
    const first = await postJson('/events?wait=1', { image_path: 'run1/frame001.jpg', caption: 'a red chair' });
    const second = await postJson('/events?wait=1', { image_path: 'run1/frame001.jpg', caption: 'a red chair' });

    const a = RecordBody.parse(await first.json());
    const b = RecordBody.parse(await second.json());
    expect(a.record.event_id).toMatch(/^[0-9a-f]{16}$/);
    expect(b.record.event_id).toBe(a.record.event_id);
  });

  it('rejects an invalid body with the failing fields', async () => {
    const res = await postJson('/events', { caption: 'a chair' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'image_path: Required' });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${base}/events`, { method: 'POST', body: '{"image_path":' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'body is not valid JSON' });
  });

  it('rejects paths outside the captures root', async () => {
    const res = await postJson('/events', { image_path: '../outside.jpg', caption: 'a chair' });

    expect(res.status).toBe(400);
  });

  it('answers 404 for a missing frame', async () => {
    const res = await postJson('/events', { image_path: 'run1/missing.jpg', caption: 'a chair' });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: 'image not found: run1/missing.jpg' });
  });

  it('rejects an oversized body', async () => {
    const res = await postJson('/events', { image_path: 'run1/frame001.jpg', caption: 'x'.repeat(5000) });

    expect(res.status).toBe(413);
  });

  it('pairs a plain-text caption with the newest frame', async () => {
    const res = await fetch(`${base}/from_vila?wait=1`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: '  a red chair by the window \n',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      record: {
        image_path: path.join(root, 'run1', 'frame002.jpg'),
        caption: 'a red chair by the window',
        status: 'published',
      },
    });
  });

  it('rejects an empty caption', async () => {
    const res = await fetch(`${base}/from_vila`, { method: 'POST', body: '   ' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'empty caption' });
  });

  it('lists recent records newest first', async () => {
    await postJson('/events?wait=1', { image_path: 'run1/frame001.jpg', caption: 'a chair', event_id: 'evt-a' });
    await postJson('/events?wait=1', { image_path: 'run1/frame002.jpg', caption: 'a chair', event_id: 'evt-b' });

    const res = await fetch(`${base}/latest?limit=1`);
    expect(await res.json()).toMatchObject({ ok: true, records: [{ event_id: 'evt-b' }] });
  });

  it('rejects an event id with a broken escape', async () => {
    const res = await fetch(`${base}/events/%E0%A4%A`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'malformed event id' });
  });

  it('answers 404 for unknown events and routes', async () => {
    expect((await fetch(`${base}/events/nope`)).status).toBe(404);
    expect((await fetch(`${base}/nowhere`)).status).toBe(404);
  });
});
