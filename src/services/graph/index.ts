// Graph service exports
export { GraphClient, type GraphClientOptions } from './client.js';
export { GraphTokenProvider, type TokenProviderOptions } from './token-provider.js';
export { createTransport, toAppError, type HttpTransport, type HttpResponse } from './http.js';
export { parseMessage, htmlToText, formatSender } from './message-parser.js';
