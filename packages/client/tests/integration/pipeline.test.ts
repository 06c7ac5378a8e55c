import { delay, HttpResponse, http } from 'msw';
import { beforeEach, describe, expect, it } from 'vitest';
import { ZendeskClient } from '../../src/client.js';
import {
  ApiError,
  EncodingError,
  NetworkError,
  ServerError,
} from '../../src/errors/index.js';
import { BASE_URL } from '../mocks/handlers.js';
import { server } from '../setup.js';

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

describe('Request pipeline', () => {
  let client: ZendeskClient;

  beforeEach(() => {
    client = new ZendeskClient({ subdomain: 'acme' });
  });

  describe('GET', () => {
    it('should return the raw body on 200', async () => {
      server.use(
        http.get(`${BASE_URL}/tickets/count.json`, () => {
          return HttpResponse.json({ count: { value: 12 } });
        }),
      );

      const body = await client.get('/tickets/count.json');
      expect(textDecoder.decode(body)).toBe('{"count":{"value":12}}');
    });

    it.each([201, 202, 204, 404, 500])(
      'should reject status %i',
      async (status) => {
        server.use(
          http.get(`${BASE_URL}/tickets/count.json`, () => {
            return new HttpResponse(status === 204 ? null : 'nope', { status });
          }),
        );

        const error = await client.get('/tickets/count.json').catch((e) => e);
        expect(error).toBeInstanceOf(ApiError);
        expect(error.status).toBe(status);
      },
    );
  });

  describe('POST', () => {
    it.each([200, 201])('should accept status %i', async (status) => {
      server.use(
        http.post(`${BASE_URL}/macros.json`, () => {
          return HttpResponse.json({ macro: { id: 1 } }, { status });
        }),
      );

      const body = await client.post('/macros.json', { macro: { title: 'Close' } });
      expect(textDecoder.decode(body)).toBe('{"macro":{"id":1}}');
    });

    it('should reject 204', async () => {
      server.use(
        http.post(`${BASE_URL}/macros.json`, () => {
          return new HttpResponse(null, { status: 204 });
        }),
      );

      const error = await client.post('/macros.json', {}).catch((e) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error.status).toBe(204);
      expect(error.message).toBe('HTTP 204 error');
    });

    it('should send the body as JSON', async () => {
      let contentType: string | null = null;
      let sent: unknown;

      server.use(
        http.post(`${BASE_URL}/macros.json`, async ({ request }) => {
          contentType = request.headers.get('Content-Type');
          sent = await request.json();
          return HttpResponse.json({}, { status: 201 });
        }),
      );

      await client.post('/macros.json', { macro: { title: 'Close', active: true } });

      expect(contentType).toBe('application/json');
      expect(sent).toEqual({ macro: { title: 'Close', active: true } });
    });

    it('should fail with EncodingError before sending an unserializable body', async () => {
      let requests = 0;

      server.use(
        http.post(`${BASE_URL}/macros.json`, () => {
          requests++;
          return HttpResponse.json({}, { status: 201 });
        }),
      );

      const error = await client
        .post('/macros.json', { big: BigInt(1) })
        .catch((e) => e);

      expect(error).toBeInstanceOf(EncodingError);
      expect(error).not.toBeInstanceOf(ApiError);
      expect(requests).toBe(0);
    });
  });

  describe('PUT and PATCH', () => {
    it('should return an empty body on PUT 204', async () => {
      server.use(
        http.put(`${BASE_URL}/webhooks/01ABC`, () => {
          return new HttpResponse(null, { status: 204 });
        }),
      );

      const body = await client.put('/webhooks/01ABC', { webhook: { name: 'Hook' } });
      expect(body).toBeInstanceOf(Uint8Array);
      expect(body.byteLength).toBe(0);
    });

    it('should return an empty body on PATCH 204', async () => {
      server.use(
        http.patch(`${BASE_URL}/webhooks/01ABC`, () => {
          return new HttpResponse(null, { status: 204 });
        }),
      );

      const body = await client.patch('/webhooks/01ABC', { webhook: { status: 'inactive' } });
      expect(body.byteLength).toBe(0);
    });

    it('should return the body on PATCH 200', async () => {
      server.use(
        http.patch(`${BASE_URL}/webhooks/01ABC`, () => {
          return HttpResponse.text('updated');
        }),
      );

      const body = await client.patch('/webhooks/01ABC', {});
      expect(textDecoder.decode(body)).toBe('updated');
    });

    it.each([201, 202])('should reject PUT status %i', async (status) => {
      server.use(
        http.put(`${BASE_URL}/webhooks/01ABC`, () => {
          return HttpResponse.json({ webhook: {} }, { status });
        }),
      );

      const error = await client.put('/webhooks/01ABC', {}).catch((e) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error.status).toBe(status);
    });
  });

  describe('DELETE', () => {
    it('should succeed on 204 without a body', async () => {
      let sentText: string | undefined;

      server.use(
        http.delete(`${BASE_URL}/tickets/destroy_many.json`, async ({ request }) => {
          sentText = await request.text();
          return new HttpResponse(null, { status: 204 });
        }),
      );

      await expect(client.delete('/tickets/destroy_many.json')).resolves.toBeUndefined();
      expect(sentText).toBe('');
    });

    it('should send no body for a null payload', async () => {
      let sentText: string | undefined;

      server.use(
        http.delete(`${BASE_URL}/tickets/destroy_many.json`, async ({ request }) => {
          sentText = await request.text();
          return new HttpResponse(null, { status: 204 });
        }),
      );

      await client.delete('/tickets/destroy_many.json', null);
      expect(sentText).toBe('');
    });

    it('should send an optional JSON body', async () => {
      let sent: unknown;

      server.use(
        http.delete(`${BASE_URL}/tickets/destroy_many.json`, async ({ request }) => {
          sent = await request.json();
          return new HttpResponse(null, { status: 204 });
        }),
      );

      await client.delete('/tickets/destroy_many.json', { ids: [1, 2] });
      expect(sent).toEqual({ ids: [1, 2] });
    });

    it('should reject an unexpected 200', async () => {
      server.use(
        http.delete(`${BASE_URL}/tickets/destroy_many.json`, () => {
          return HttpResponse.json({ job_status: { id: 'abc' } });
        }),
      );

      const error = await client.delete('/tickets/destroy_many.json').catch((e) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error.status).toBe(200);
      expect(error.method).toBe('DELETE');
      expect(error.url).toBe(`${BASE_URL}/tickets/destroy_many.json`);
    });
  });

  describe('Structured errors', () => {
    it('should capture the exact response body bytes', async () => {
      const payload = '{"error":"RecordInvalid","details":{"name":[{"description":"ünïcode"}]}}';

      server.use(
        http.post(`${BASE_URL}/groups.json`, () => {
          return new HttpResponse(payload, {
            status: 422,
            statusText: 'Unprocessable Entity',
            headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-1' },
          });
        }),
      );

      const error = await client.post('/groups.json', { group: {} }).catch((e) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error.body).toEqual(textEncoder.encode(payload));
      expect(error.text()).toBe(payload);
      expect(error.message).toBe(`422: ${payload}`);
      expect(error.statusText).toBe('Unprocessable Entity');
      expect(error.headers.get('X-Request-Id')).toBe('req-1');
      expect(error.retryable).toBe(false);
    });

    it('should mark 5xx responses as retryable without retrying', async () => {
      let attempts = 0;

      server.use(
        http.get(`${BASE_URL}/groups.json`, () => {
          attempts++;
          return HttpResponse.json({ error: 'Server error' }, { status: 503 });
        }),
      );

      const error = await client.get('/groups.json').catch((e) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error.retryable).toBe(true);
      expect(attempts).toBe(1);
    });
  });

  describe('Transport errors', () => {
    it('should surface connection failures as NetworkError', async () => {
      server.use(
        http.get(`${BASE_URL}/groups.json`, () => {
          return HttpResponse.error();
        }),
      );

      const error = await client.get('/groups.json').catch((e) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).not.toBeInstanceOf(ApiError);
      expect(error.statusCode).toBeUndefined();
      expect(error.cause).toBeDefined();
    });

    it('should surface a caller abort as NetworkError', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await client
        .get('/groups.json', { signal: controller.signal })
        .catch((e) => e);

      expect(error).toBeInstanceOf(NetworkError);
    });

    it('should surface a timeout as NetworkError', async () => {
      server.use(
        http.get(`${BASE_URL}/groups.json`, async () => {
          await delay(200);
          return HttpResponse.json({ groups: [] });
        }),
      );

      const shortTimeoutClient = new ZendeskClient({ subdomain: 'acme', timeout: 10 });
      const error = await shortTimeoutClient.get('/groups.json').catch((e) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toContain(`GET ${BASE_URL}/groups.json failed`);
    });
  });
});
