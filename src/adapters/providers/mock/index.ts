export { MockHttpTransport } from './mock-http.transport';
