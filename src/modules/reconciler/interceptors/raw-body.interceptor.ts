import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Hands the raw request bytes to the handler as its body. The signature
 * covers field values rather than bytes, so a re-serialized body still
 * verifies when the app runs without `rawBody: true`.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context
      .switchToHttp()
      .getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body);
      request.body = request.rawBody;
    } else if (request.body && typeof request.body === 'object') {
      // Already parsed by the JSON body parser
      request.rawBody = Buffer.from(JSON.stringify(request.body));
      request.body = request.rawBody;
    } else {
      request.rawBody = Buffer.alloc(0);
      request.body = request.rawBody;
    }

    return next.handle();
  }
}
