export * from './hosted-checkout.client';
export { FetchHttpTransport } from './fetch-http.transport';
