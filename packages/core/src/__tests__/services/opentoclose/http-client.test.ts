import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { HttpMethod } from '@otc/types';
import { OpenToCloseHttpClient } from '../../../services/opentoclose/http-client';
import {
  AuthenticationError,
  NetworkError,
  NotFoundError,
  OpenToCloseAPIError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../../../services/opentoclose/errors';
import {
  TEST_API_KEY,
  TEST_BASE_URL,
  createMockLogger,
  emptyResponse,
  installFetchMock,
  jsonBodyAt,
  jsonResponse,
  requestAt,
  textResponse,
  type FetchMock,
} from '../../utils/mocks';

/**
 * Open To Close transport tests
 *
 * These tests verify:
 * - Credential placement in the query string
 * - Body encoding (JSON and multipart)
 * - Success body decoding
 * - Status code to error mapping
 */

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to reject');
}

describe('OpenToCloseHttpClient', () => {
  let mockFetch: FetchMock;
  let http: OpenToCloseHttpClient;

  beforeEach(() => {
    mockFetch = installFetchMock();
    http = new OpenToCloseHttpClient({ apiKey: TEST_API_KEY, baseUrl: TEST_BASE_URL });
  });

  // ==========================================================================
  // Requests
  // ==========================================================================

  describe('request building', () => {
    it('should send the token as the api_token query parameter', async () => {
      mockFetch.mockResolvedValue(jsonResponse([{ id: 1 }]));

      const body = await http.get('/contacts', { limit: 10 });

      expect(body).toEqual([{ id: 1 }]);
      const { url, method, headers } = requestAt(mockFetch);
      expect(`${url.origin}${url.pathname}`).toBe(`${TEST_BASE_URL}/contacts`);
      expect(url.searchParams.get('api_token')).toBe(TEST_API_KEY);
      expect(url.searchParams.get('limit')).toBe('10');
      expect(method).toBe('GET');
      expect(headers.get('accept')).toBe('application/json');
      expect(headers.get('authorization')).toBeNull();
    });

    it('should treat endpoints with and without a leading slash alike', async () => {
      mockFetch.mockImplementation(() => Promise.resolve(jsonResponse([])));

      await http.get('/tags');
      await http.get('tags');

      expect(requestAt(mockFetch, 0).url.pathname).toBe('/v1/tags');
      expect(requestAt(mockFetch, 1).url.pathname).toBe('/v1/tags');
    });

    it('should use the base URL exactly as configured', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));
      const client = new OpenToCloseHttpClient({
        apiKey: TEST_API_KEY,
        baseUrl: `${TEST_BASE_URL}/`,
      });

      await client.get('/users');

      expect(requestAt(mockFetch).url.pathname).toBe('/v1//users');
    });

    it('should strip only one leading slash from the endpoint', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));

      await http.get('//users');

      expect(requestAt(mockFetch).url.pathname).toBe('/v1//users');
    });

    it('should repeat array parameters and skip empty ones', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));

      await http.get('/contacts', { ids: [1, 2], skip: null, q: undefined });

      const { url } = requestAt(mockFetch);
      expect(url.searchParams.getAll('ids')).toEqual(['1', '2']);
      expect(url.searchParams.has('skip')).toBe(false);
      expect(url.searchParams.has('q')).toBe(false);
    });

    it('should reject query values that cannot go in a URL', async () => {
      await expect(http.get('/contacts', { filter: { a: 1 } })).rejects.toThrow(
        'Query parameter filter cannot be encoded in a URL: object'
      );
      await expect(http.get('/contacts', { ids: [{ id: 1 }] })).rejects.toThrow(
        'Query parameter ids cannot be encoded in a URL: array'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should send the token on writes as well', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ id: 3, name: 'Hot' }, 201));

      const body = await http.post('/tags', { name: 'Hot' });

      expect(body).toEqual({ id: 3, name: 'Hot' });
      const { url, method, headers } = requestAt(mockFetch);
      expect(method).toBe('POST');
      expect(url.searchParams.get('api_token')).toBe(TEST_API_KEY);
      expect(headers.get('content-type')).toBe('application/json');
      expect(jsonBodyAt(mockFetch)).toEqual({ name: 'Hot' });
    });

    it('should send form fields and files as multipart', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ id: 8 }));

      await http.post('/properties/1/documents', undefined, {
        form: { name: 'Contract' },
        files: {
          file: {
            filename: 'contract.pdf',
            content: 'PDF-DATA',
            contentType: 'application/pdf',
          },
        },
      });

      const { body, headers } = requestAt(mockFetch);
      expect(body).toBeInstanceOf(FormData);
      expect(headers.get('content-type')).toBeNull();
      if (body instanceof FormData) {
        expect(body.get('name')).toBe('Contract');
        const file = body.get('file');
        expect(file).toBeInstanceOf(Blob);
        if (file instanceof Blob) {
          expect(await file.text()).toBe('PDF-DATA');
          expect(file.type).toBe('application/pdf');
        }
      }
    });

    it('should refuse a JSON body combined with files', async () => {
      await expect(
        http.post('/properties/1/documents', { name: 'x' }, { form: { name: 'y' } })
      ).rejects.toThrow('A JSON body cannot be combined with form fields or files');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should reject an empty endpoint before calling out', async () => {
      await expect(http.get('  ')).rejects.toBeInstanceOf(ValidationError);
      await expect(http.get('/')).rejects.toThrow('Endpoint cannot be empty');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // Success bodies
  // ==========================================================================

  describe('success bodies', () => {
    it.each<HttpMethod>(['GET', 'POST', 'PUT', 'PATCH', 'DELETE'])(
      'should return {} for a 204 on %s without reading the body',
      async (method) => {
        const response = emptyResponse(204);
        const textSpy = vi.spyOn(response, 'text');
        mockFetch.mockResolvedValue(response);

        await expect(http.request(method, '/tags/1')).resolves.toEqual({});
        expect(textSpy).not.toHaveBeenCalled();
      }
    );

    it('should return {} for an empty success body', async () => {
      mockFetch.mockResolvedValue(new Response('', { status: 200 }));
      await expect(http.get('/tags')).resolves.toEqual({});
    });

    it('should return {} for a success body that is not JSON', async () => {
      mockFetch.mockResolvedValue(textResponse('<html>ok</html>', 200));
      await expect(http.get('/tags')).resolves.toEqual({});
    });

    it('should treat other 2xx statuses as unexpected', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ id: 1 }, 202));

      const error = await captureRejection(http.post('/tags', { name: 'Queued' }));

      expect(error).toBeInstanceOf(OpenToCloseAPIError);
      expect(error).not.toBeInstanceOf(ValidationError);
      if (error instanceof OpenToCloseAPIError) {
        expect(error.message).toBe('Unexpected status 202 for POST /tags');
        expect(error.statusCode).toBe(202);
        expect(error.responseData).toEqual({ id: 1 });
      }
    });
  });

  // ==========================================================================
  // Errors
  // ==========================================================================

  describe('error mapping', () => {
    it('should raise RateLimitError for a 429', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ message: 'slow down' }, 429, { 'Retry-After': '30' })
      );

      const error = await captureRejection(http.get('/contacts'));

      expect(error).toBeInstanceOf(RateLimitError);
      if (error instanceof RateLimitError) {
        expect(error.message).toBe('Rate limit exceeded for GET /contacts: slow down');
        expect(error.statusCode).toBe(429);
        expect(error.retryAfter).toBe(30);
        expect(error.responseData).toEqual({ message: 'slow down' });
        expect(error.endpoint).toBe('/contacts');
        expect(error.method).toBe('GET');
      }
    });

    it('should raise ValidationError with field errors for a 400', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ message: 'Invalid payload', errors: { email: ['is invalid'] } }, 400)
      );

      const error = await captureRejection(http.post('/contacts', { email: 'x@y' }));

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Bad request to POST /contacts: Invalid payload');
        expect(error.fieldErrors).toEqual([{ field: 'email', message: 'is invalid' }]);
      }
    });

    it('should fall back to a default detail when the body is empty', async () => {
      mockFetch.mockResolvedValue(new Response('', { status: 401 }));

      const error = await captureRejection(http.get('/users'));

      expect(error).toBeInstanceOf(AuthenticationError);
      if (error instanceof AuthenticationError) {
        expect(error.message).toBe('Authentication failed for GET /users: Invalid credentials');
        expect(error.responseData).toEqual({});
      }
    });

    it('should read the error key when there is no message', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ error: 'No such contact' }, 404));

      await expect(http.get('/contacts/9')).rejects.toThrow(
        'Resource not found for GET /contacts/9: No such contact'
      );
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should use a raw text body as the detail', async () => {
      mockFetch.mockResolvedValue(textResponse('Bad Gateway', 502));

      const error = await captureRejection(http.get('/tags'));

      expect(error).toBeInstanceOf(ServerError);
      if (error instanceof ServerError) {
        expect(error.message).toBe('Server error for GET /tags: Bad Gateway');
        expect(error.statusCode).toBe(502);
        expect(error.responseData).toEqual({
          message: 'Bad Gateway',
          raw_content: 'Bad Gateway',
        });
      }
    });

    it('should raise the base error for unmapped codes', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 409));

      const error = await captureRejection(http.delete('/tags/1'));

      expect(error).toBeInstanceOf(OpenToCloseAPIError);
      expect(error).not.toBeInstanceOf(ValidationError);
      if (error instanceof OpenToCloseAPIError) {
        expect(error.constructor).toBe(OpenToCloseAPIError);
        expect(error.message).toBe('Unexpected error for DELETE /tags/1: Unknown error');
        expect(error.statusCode).toBe(409);
      }
    });

    it('should wrap a fetch rejection in NetworkError', async () => {
      const cause = new TypeError('fetch failed');
      mockFetch.mockRejectedValue(cause);

      const error = await captureRejection(http.get('/contacts'));

      expect(error).toBeInstanceOf(NetworkError);
      if (error instanceof NetworkError) {
        expect(error.message).toBe('Network error for GET /contacts: fetch failed');
        expect(error.cause).toBe(cause);
        expect(error.statusCode).toBeUndefined();
      }
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should report a timeout as NetworkError', async () => {
      mockFetch.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const client = new OpenToCloseHttpClient({
        apiKey: TEST_API_KEY,
        baseUrl: TEST_BASE_URL,
        timeout: 5,
      });

      await expect(client.get('/contacts')).rejects.toThrow(
        'Request to GET /contacts timed out after 5ms'
      );
    });
  });

  // ==========================================================================
  // Logging
  // ==========================================================================

  describe('logging', () => {
    it('should log initialisation at info', () => {
      const logger = createMockLogger();

      new OpenToCloseHttpClient({ apiKey: TEST_API_KEY, baseUrl: TEST_BASE_URL, logger });

      expect(logger.info).toHaveBeenCalledWith('Initialized Open To Close HTTP client', {
        baseUrl: TEST_BASE_URL,
        timeout: 30000,
      });
    });

    it('should log calls without the token', async () => {
      const logger = createMockLogger();
      const client = new OpenToCloseHttpClient({
        apiKey: TEST_API_KEY,
        baseUrl: TEST_BASE_URL,
        logger,
      });
      mockFetch.mockResolvedValue(jsonResponse([]));

      await client.get('/contacts', { limit: 5 });

      expect(logger.debug).toHaveBeenCalledWith('Making GET request to /contacts', {
        url: `${TEST_BASE_URL}/contacts`,
        hasJson: false,
        hasForm: false,
        hasFiles: false,
        queryParamCount: 1,
      });
      expect(logger.externalService).toHaveBeenCalledWith(
        expect.objectContaining({
          service: 'opentoclose',
          endpoint: 'GET /contacts',
          statusCode: 200,
          success: true,
        })
      );
    });
  });
});
