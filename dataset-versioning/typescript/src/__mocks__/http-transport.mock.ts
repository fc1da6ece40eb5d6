import { vi } from 'vitest';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/http-transport.js';

export interface MockHttpTransport extends HttpTransport {
  request: ReturnType<typeof vi.fn>;
  close: ReturnType<typeof vi.fn>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    request: vi.fn(),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

export function jsonResponse(status: number, body?: unknown): HttpResponse {
  return { status, headers: { 'content-type': 'application/json' }, body };
}

/**
 * Routes requests by `"<METHOD> <path>"`. Unrouted requests answer 404.
 */
export function routeHttpTransport(
  transport: MockHttpTransport,
  routes: Record<string, HttpResponse | ((request: HttpRequest) => HttpResponse)>
): void {
  transport.request.mockImplementation(async (request: HttpRequest) => {
    const route = routes[`${request.method} ${request.path}`];
    if (route === undefined) return jsonResponse(404, { message: 'not found' });
    return typeof route === 'function' ? route(request) : route;
  });
}

export function mockHttpTransportError(transport: MockHttpTransport, error: Error): void {
  transport.request.mockRejectedValue(error);
}
