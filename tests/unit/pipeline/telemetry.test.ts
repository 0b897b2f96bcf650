/**
 * Unit tests for the telemetry client
 *
 * @module tests/unit/pipeline/telemetry
 */

import { describe, it, expect, afterEach, vi } from 'vitest';

import { TelemetryClient } from '../../../src/services/pipeline/index.js';

const ENDPOINT = 'https://telemetry.example.test/api/event';

describe('TelemetryClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends nothing without an endpoint', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await new TelemetryClient({ domain: 'casefile-radar' }).track('document_processed', { persons: 2 });

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the event payload', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 202 }));
    vi.stubGlobal('fetch', fetchMock);

    await new TelemetryClient({ endpoint: ENDPOINT, domain: 'radar.example.test' }).track(
      'document_processed',
      { batch_label: 'march', persons: 2, ok: true, bad: Number.NaN }
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      name: 'document_processed',
      url: 'app://casefile-radar/document_processed',
      domain: 'radar.example.test',
      props: { batch_label: 'march', persons: 2, ok: true },
    });
  });

  it('resolves when delivery fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(
      new TelemetryClient({ endpoint: ENDPOINT, domain: 'casefile-radar' }).track('document_failed', {})
    ).resolves.toBeUndefined();
  });

  it('resolves when the endpoint rejects the event', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));

    await expect(
      new TelemetryClient({ endpoint: ENDPOINT, domain: 'casefile-radar' }).track('document_failed', {})
    ).resolves.toBeUndefined();
  });
});
