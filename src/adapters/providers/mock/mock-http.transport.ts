import { HttpRequest, HttpResponse, HttpTransport } from '../../../core';

type ScriptedReply = HttpResponse | Error;

/**
 * In-process HttpTransport for tests.
 * Replies are consumed in order; once exhausted, the default reply is used.
 */
export class MockHttpTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly replies: ScriptedReply[] = [];
  private defaultReply: ScriptedReply = { status: 200, body: '{}' };

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const reply = this.replies.shift() ?? this.defaultReply;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  /**
   * Queue a JSON reply (or a raw string body)
   */
  respondWith(status: number, body: unknown): this {
    this.replies.push({
      status,
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    return this;
  }

  /**
   * Queue a transport failure such as a timeout
   */
  failWith(error: Error): this {
    this.replies.push(error);
    return this;
  }

  setDefault(status: number, body: unknown): this {
    this.defaultReply = {
      status,
      body: typeof body === 'string' ? body : JSON.stringify(body),
    };
    return this;
  }

  /**
   * Decoded body of the nth request
   */
  bodyOf(index: number): unknown {
    const request = this.requests[index];
    return request ? JSON.parse(request.body) : undefined;
  }

  lastRequest(): HttpRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  reset(): void {
    this.requests.length = 0;
    this.replies.length = 0;
    this.defaultReply = { status: 200, body: '{}' };
  }
}
