import { describe, it, expect, vi } from 'vitest';
import { fetchText, HttpStatusError } from './http';

function textResponse(body: string) {
  return { ok: true, status: 200, statusText: 'OK', text: vi.fn().mockResolvedValue(body) };
}

function statusResponse(status: number, statusText: string) {
  return { ok: false, status, statusText, text: vi.fn() };
}

describe('fetchText', () => {
  it('issues a GET with a timeout signal', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(textResponse('a,b'));

    const body = await fetchText('https://example.test/sheet.csv', { fetchImpl });

    expect(body).toBe('a,b');
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://example.test/sheet.csv',
      expect.objectContaining({ method: 'GET', redirect: 'follow', signal: expect.any(AbortSignal) }),
    );
  });

  it('does not retry by default', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(statusResponse(503, 'Service Unavailable'));

    await expect(fetchText('https://example.test/x', { fetchImpl })).rejects.toThrow('HTTP 503 Service Unavailable');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('retries server errors when more attempts are allowed', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValueOnce(statusResponse(503, 'Service Unavailable'))
      .mockResolvedValueOnce(textResponse('ok'));

    const body = await fetchText('https://example.test/x', { fetchImpl, attempts: 2, minDelay: 0 });

    expect(body).toBe('ok');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('gives up immediately on client errors', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(statusResponse(404, 'Not Found'));

    const error = await fetchText('https://example.test/x', { fetchImpl, attempts: 3, minDelay: 0 }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(HttpStatusError);
    if (error instanceof HttpStatusError) {
      expect(error.status).toBe(404);
    }
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('retries network failures', async () => {
    const fetchImpl = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(textResponse('ok'));

    await expect(fetchText('https://example.test/x', { fetchImpl, attempts: 2, minDelay: 0 })).resolves.toBe('ok');
  });
});
