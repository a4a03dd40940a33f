import {z} from 'zod';
import {ToolExecutionError, formatErrorMessage} from '../agent/errors.js';
import type {Tool, ToolExecutionContext, ToolOutput} from '../agent/types.js';
import {defineTool} from './execution.js';

export interface WebToolOptions {
  timeoutMs: number;
  maxOutputChars: number;
}

const httpUrl = z
  .string()
  .trim()
  .url('Provide an absolute URL.')
  .refine(value => /^https?:\/\//i.test(value), 'Only http and https URLs are supported.');

const fetchArgs = z.object({
  url: httpUrl
});

const requestArgs = z.object({
  url: httpUrl,
  method: z
    .string()
    .trim()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']))
    .optional(),
  headers: z.record(z.string()).optional(),
  body: z.union([z.string(), z.record(z.unknown()), z.array(z.unknown())]).optional()
});

const HTML_CONTENT = /text\/html|application\/xhtml/i;

const htmlToText = (html: string): string =>
  html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>|<\/(p|div|li|h[1-6]|tr)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

const send = async (toolName: string, url: string, init: RequestInit, ctx: ToolExecutionContext) => {
  try {
    return await fetch(url, {...init, signal: ctx.signal});
  } catch (error) {
    if (ctx.signal.aborted) {
      throw error;
    }
    // undici reports "fetch failed" and keeps the socket error as the cause
    const fault = error instanceof Error && error.cause instanceof Error ? error.cause : error;
    throw new ToolExecutionError(toolName, `Request to ${url} failed: ${formatErrorMessage(fault)}`, {cause: error});
  }
};

/** Reads at most `limit` characters of the body, then cancels the rest of the download. */
const readBody = async (response: Response, limit: number): Promise<{text: string; truncated: boolean}> => {
  if (!response.body) {
    return {text: '', truncated: false};
  }
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  for (;;) {
    const {done, value} = await reader.read();
    if (done) {
      return {text: text + decoder.decode(), truncated: false};
    }
    text += decoder.decode(value, {stream: true});
    if (text.length > limit) {
      await reader.cancel();
      return {text: text.slice(0, limit), truncated: true};
    }
  }
};

// markup is stripped after reading, so HTML pages get a larger raw allowance
const HTML_READ_FACTOR = 8;

// a failing HTTP status is reported through exitStatus
const statusExit = (response: Response) => (response.ok ? 0 : response.status);

export const createWebFetchTool = ({timeoutMs, maxOutputChars}: WebToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'web_fetch',
      description: 'Download a web page with GET and return its readable text.',
      inputGuide: 'JSON: {"url": "https://example.com"}',
      timeoutMs,
      sideEffect: 'read-only',
      maxOutputChars
    },
    schema: fetchArgs,
    async execute({url}, ctx): Promise<ToolOutput> {
      const response = await send('web_fetch', url, {method: 'GET'}, ctx);
      const contentType = response.headers.get('content-type') ?? '';
      const isHtml = HTML_CONTENT.test(contentType);
      const body = await readBody(response, isHtml ? maxOutputChars * HTML_READ_FACTOR : maxOutputChars);
      const text = isHtml ? htmlToText(body.text) : body.text.trim();
      const output = response.ok
        ? text || `${url} returned an empty body.`
        : `HTTP ${response.status} ${response.statusText}\n${text}`.trim();
      return {output, exitStatus: statusExit(response), truncated: body.truncated};
    }
  });

export const createHttpRequestTool = ({timeoutMs, maxOutputChars}: WebToolOptions): Tool =>
  defineTool({
    descriptor: {
      name: 'http_request',
      description: 'Call an HTTP API. Objects in "body" are sent as JSON. Returns the status line and response body.',
      inputGuide:
        'JSON: {"url": "https://api.example.com/items", "method": "POST", "headers": {"Accept": "application/json"}, "body": {"name": "x"}}',
      timeoutMs,
      sideEffect: 'mutating',
      maxOutputChars
    },
    schema: requestArgs,
    async execute({url, method, headers, body}, ctx): Promise<ToolOutput> {
      const requestHeaders = new Headers(headers);
      let payload: string | undefined;
      if (typeof body === 'string') {
        payload = body;
      } else if (body !== undefined) {
        payload = JSON.stringify(body);
        if (!requestHeaders.has('content-type')) {
          requestHeaders.set('content-type', 'application/json');
        }
      }

      const response = await send(
        'http_request',
        url,
        {method: method ?? (payload === undefined ? 'GET' : 'POST'), headers: requestHeaders, body: payload},
        ctx
      );
      const responseBody = await readBody(response, maxOutputChars);
      const text = responseBody.text.trim();
      return {
        output: `HTTP ${response.status} ${response.statusText}${text ? `\n${text}` : ''}`,
        exitStatus: statusExit(response),
        truncated: responseBody.truncated
      };
    }
  });
