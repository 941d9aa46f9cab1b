import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ReceiverServer } from '../../../src/receiver/server.js';
import type { ReceivedItem } from '../../../src/receiver/types.js';

const RECEIVED_AT = Date.parse('2026-03-01T12:00:00Z');

describe('ReceiverServer', () => {
  let server: ReceiverServer;
  let base: string;
  let items: ReceivedItem[];

  beforeEach(async () => {
    server = new ReceiverServer({ port: 0, host: '127.0.0.1', maxBodyBytes: 1024, now: () => RECEIVED_AT });
    items = [];
    server.onItem((item) => {
      items.push(item);
    });
    base = await server.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  function postJson(path: string, body: unknown): Promise<Response> {
    return fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  // ── Lifecycle ──

  it('should listen on a free port and report it', () => {
    const port = server.getPort();
    expect(port).toBeGreaterThan(0);
    expect(base).toBe(`http://127.0.0.1:${port}`);
    expect(server.isRunning()).toBe(true);
  });

  it('should answer health checks with the received count', async () => {
    await postJson('/clipboard', { text: 'hi', timestamp: 1 });

    const response = await fetch(`${base}/health`);
    expect(await response.json()).toEqual({ status: 'ok', received: 1 });
  });

  it('should stop listening', async () => {
    await server.stop();
    expect(server.isRunning()).toBe(false);
    expect(server.getPort()).toBeNull();
    await expect(fetch(`${base}/health`)).rejects.toThrow();
  });

  // ── Photos ──

  it('should accept a multipart photo in the data field', async () => {
    const form = new FormData();
    form.append('data', new Blob([new Uint8Array([1, 2, 3])], { type: 'application/octet-stream' }), 'IMG_1.jpg');

    const response = await fetch(`${base}/upload`, { method: 'POST', body: form });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ accepted: true, kind: 'photo' });
    expect(items).toHaveLength(1);
    const [photo] = items;
    expect(photo?.kind).toBe('photo');
    if (photo?.kind !== 'photo') return;
    expect(photo.fileName).toBe('IMG_1.jpg');
    expect([...photo.bytes]).toEqual([1, 2, 3]);
    expect(photo.receivedAt).toBe(RECEIVED_AT);
  });

  it('should reject an upload without a data field', async () => {
    const form = new FormData();
    form.append('image', new Blob([new Uint8Array([1])]), 'IMG_1.jpg');

    const response = await fetch(`${base}/upload`, { method: 'POST', body: form });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Missing data' });
    expect(items).toHaveLength(0);
  });

  it('should reject an upload that is not multipart', async () => {
    const response = await postJson('/upload', { data: 'x' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Expected a multipart/form-data upload' });
  });

  // ── Messages ──

  it('should accept an sms and default a missing code', async () => {
    const response = await postJson('/sms', { sender: 'Bank', content: 'Balance updated' });

    expect(response.status).toBe(200);
    expect(items).toEqual([
      { kind: 'sms', sender: 'Bank', content: 'Balance updated', code: '', receivedAt: RECEIVED_AT },
    ]);
  });

  it('should accept clipboard text', async () => {
    await postJson('/clipboard', { text: 'copied', timestamp: 1700 });

    expect(items).toEqual([{ kind: 'clipboard', text: 'copied', timestamp: 1700, receivedAt: RECEIVED_AT }]);
  });

  it('should reject payloads of the wrong shape', async () => {
    const response = await postJson('/clipboard', { text: 'copied', timestamp: 'now' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid clipboard payload: timestamp: Expected number, received string',
    });
  });

  it('should reject bodies that are not JSON', async () => {
    const response = await fetch(`${base}/sms`, { method: 'POST', body: 'sender=Bank' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid SMS JSON' });
  });

  // ── Limits and routing ──

  it('should refuse bodies over the size limit', async () => {
    const rejected = vi.fn();
    server.getEvents().on('receiver:rejected', rejected);

    const response = await postJson('/clipboard', { text: 'x'.repeat(2048), timestamp: 1 });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'Body exceeds 1024 bytes' });
    expect(rejected).toHaveBeenCalledWith({ path: '/clipboard', status: 413, reason: 'Body exceeds 1024 bytes' });
    expect(items).toHaveLength(0);
  });

  it('should only take POST on known routes', async () => {
    expect((await fetch(`${base}/sms`)).status).toBe(405);
    expect((await postJson('/photos', {})).status).toBe(404);
  });

  // ── Handler failures ──

  it('should answer 500 when the item cannot be stored', async () => {
    server.onItem(() => {
      throw new Error('ENOSPC');
    });
    const delivered = vi.fn();
    server.getEvents().on('receiver:item', delivered);

    const response = await postJson('/sms', { sender: 'Bank', content: 'hi', code: '' });

    expect(response.status).toBe(500);
    expect(server.getReceivedCount()).toBe(0);
    expect(delivered).not.toHaveBeenCalled();
  });
});
