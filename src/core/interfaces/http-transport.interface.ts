/**
 * One outbound HTTPS exchange
 */
export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Send JSON over HTTPS and return status plus body.
 * Rejects on network failure or timeout; a non-2xx status is a response,
 * not a rejection.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}
