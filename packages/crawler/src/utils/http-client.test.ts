import { describe, it, expect, vi, beforeEach } from 'vitest';

const { get, isAxiosError } = vi.hoisted(() => ({
  get: vi.fn(),
  isAxiosError: vi.fn(),
}));

vi.mock('axios', () => ({
  default: {
    create: () => ({ get }),
    isAxiosError,
  },
}));

import { HttpClient } from './http-client.js';

describe('HttpClient', () => {
  beforeEach(() => {
    get.mockReset();
    isAxiosError.mockReset();
  });

  it('returns status, content type and body for any completed response', async () => {
    get.mockResolvedValueOnce({
      status: 404,
      data: 'Not found',
      headers: { 'content-type': 'text/plain; charset=utf-8' },
    });

    const client = new HttpClient();
    const outcome = await client.getText('https://example.com/missing');

    expect(outcome).toEqual({
      ok: true,
      url: 'https://example.com/missing',
      status: 404,
      contentType: 'text/plain; charset=utf-8',
      body: 'Not found',
    });
  });

  it('reports the URL the redirects ended on', async () => {
    get.mockResolvedValueOnce({
      status: 200,
      data: '<a href="intro">Intro</a>',
      headers: { 'content-type': 'text/html' },
      request: { res: { responseUrl: 'https://example.com/docs/' } },
    });

    const outcome = await new HttpClient().getText('https://example.com/docs');

    expect(outcome.url).toBe('https://example.com/docs/');
  });

  it('defaults a missing content type to an empty string', async () => {
    get.mockResolvedValueOnce({ status: 200, data: '<html></html>', headers: {} });

    const outcome = await new HttpClient().getText('https://example.com/');

    expect(outcome.ok && outcome.contentType).toBe('');
  });

  it('reports timeouts as failed outcomes instead of throwing', async () => {
    const error = Object.assign(new Error('timeout of 10000ms exceeded'), {
      code: 'ECONNABORTED',
    });
    get.mockRejectedValueOnce(error);
    isAxiosError.mockReturnValueOnce(true);

    const outcome = await new HttpClient().getText('https://slow.example.com/');

    expect(outcome).toEqual({
      ok: false,
      url: 'https://slow.example.com/',
      reason: 'timeout of 10000ms exceeded',
      timedOut: true,
    });
  });

  it('reports network errors as not timed out', async () => {
    get.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND nowhere.test'));
    isAxiosError.mockReturnValueOnce(false);

    const outcome = await new HttpClient().getText('https://nowhere.test/');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.timedOut).toBe(false);
      expect(outcome.reason).toBe('getaddrinfo ENOTFOUND nowhere.test');
    }
  });
});
