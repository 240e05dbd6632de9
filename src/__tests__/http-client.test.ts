import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, ResponseParseError } from '../utils/http-client.js';

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, maxRetries: 0, version: '9.9.9', email: 'dev@example.com' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('crossref')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should track and reset counts per source', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('{}', { status: 200 })));

            await client.get('https://api.example.com/a', { source: 'crossref' });
            await client.get('https://api.example.com/b', { source: 'pubmed' });
            await client.get('https://api.example.com/c', { source: 'pubmed' });

            expect(client.getAllRequestCounts()).toEqual({ crossref: 1, pubmed: 2 });

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('requests', () => {
        it('should append params, skipping undefined values', async () => {
            const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get<{ ok: boolean }>('https://api.example.com/search?x=1', {
                params: { q: 'a b', rows: 5, mailto: undefined },
            });

            expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.example.com/search?x=1&q=a+b&rows=5');
            expect(response.data).toEqual({ ok: true });
            expect(response.status).toBe(200);
        });

        it('should identify itself with a mailto User-Agent', async () => {
            const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}', { status: 200 }));
            vi.stubGlobal('fetch', fetchMock);

            await client.get('https://api.example.com/');

            expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
                'User-Agent': 'litalert/9.9.9 (mailto:dev@example.com)',
            });
        });

        it('should send JSON bodies with a content type', async () => {
            const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}', { status: 200 }));
            vi.stubGlobal('fetch', fetchMock);

            await client.post('https://api.example.com/', { text: ['hi'] });

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.body).toBe('{"text":["hi"]}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
        });

        it('should return raw text from requestText', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('<xml/>', { status: 200 })));

            const response = await client.requestText('https://api.example.com/efetch');

            expect(response.data).toBe('<xml/>');
        });

        it('should raise ResponseParseError for invalid JSON', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('not json', { status: 200 })));

            await expect(client.get('https://api.example.com/')).rejects.toBeInstanceOf(ResponseParseError);
        });

        it('should raise HttpError with the status for failed responses', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' })));

            const error = await client.get('https://api.example.com/').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (error instanceof HttpError) {
                expect(error.message).toBe('HTTP 404: Not Found');
                expect(error.status).toBe(404);
                expect(error.retryable).toBe(false);
                expect(error.response).toBe('missing');
            }
        });
    });

    describe('retries', () => {
        it('should retry retryable statuses and then succeed', async () => {
            const retrying = new HttpClient({ maxRetries: 2 });
            const fetchMock = vi
                .fn(async () => new Response('{"ok":true}', { status: 200 }))
                .mockImplementationOnce(async () =>
                    new Response('', { status: 503, statusText: 'Service Unavailable', headers: { 'Retry-After': '0' } })
                );
            vi.stubGlobal('fetch', fetchMock);

            const response = await retrying.get<{ ok: boolean }>('https://api.example.com/');

            expect(fetchMock).toHaveBeenCalledTimes(2);
            expect(response.data).toEqual({ ok: true });
        });

        it('should retry connection resets', async () => {
            const retrying = new HttpClient({ maxRetries: 1 });
            const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            const fetchMock = vi.fn(async (): Promise<Response> => {
                throw reset;
            });
            vi.stubGlobal('fetch', fetchMock);
            // No jitter: the single backoff is exactly 1s
            vi.spyOn(Math, 'random').mockReturnValue(0);

            const error = await retrying.get('https://api.example.com/').catch((e: unknown) => e);

            expect(fetchMock).toHaveBeenCalledTimes(2);
            expect(error).toBeInstanceOf(HttpError);
            if (error instanceof HttpError) {
                expect(error.message).toBe('Network error: socket hang up');
                expect(error.retryable).toBe(true);
            }
        });

        it('should not retry client errors', async () => {
            const retrying = new HttpClient({ maxRetries: 2 });
            const fetchMock = vi.fn(async () => new Response('', { status: 400, statusText: 'Bad Request' }));
            vi.stubGlobal('fetch', fetchMock);

            await expect(retrying.get('https://api.example.com/')).rejects.toBeInstanceOf(HttpError);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should mark 429 as retryable', () => {
            const error = new HttpError('Rate Limited', 429, true);
            expect(error.retryable).toBe(true);
        });
    });
});
