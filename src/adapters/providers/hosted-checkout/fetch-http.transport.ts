import { HttpRequest, HttpResponse, HttpTransport } from '../../../core';

/**
 * HttpTransport on the global fetch, aborted after request.timeoutMs
 */
export class FetchHttpTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      return {
        status: response.status,
        body: await response.text(),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
