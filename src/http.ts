import https from 'node:https';
import http from 'node:http';
import { URL } from 'node:url';

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export interface PostOptions {
  timeout: number;
  userAgent: string;
}

export type PostForm = (
  urlString: string,
  form: Record<string, string>,
  options: PostOptions
) => Promise<HttpResponse>;

export const postForm: PostForm = (urlString, form, options) => {
  return new Promise((resolve, reject) => {
    const url = new URL(urlString);
    const isHttps = url.protocol === 'https:';
    const transport = isHttps ? https : http;
    const payload = new URLSearchParams(form).toString();

    const requestOptions: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method: 'POST',
      timeout: options.timeout,
      headers: {
        'User-Agent': options.userAgent,
        'Content-Type': 'application/x-www-form-urlencoded',
        'Content-Length': Buffer.byteLength(payload),
      },
    };

    const req = transport.request(requestOptions, (res) => {
      let body = '';

      res.setEncoding('utf-8');
      res.on('data', (chunk: string) => {
        body += chunk;
      });

      res.on('end', () => {
        resolve({
          statusCode: res.statusCode ?? 0,
          body,
        });
      });

      res.on('error', (err) => {
        reject(err);
      });

      res.on('close', () => {
        if (!res.complete) {
          reject(new Error('Connection closed before the response was complete'));
        }
      });
    });

    req.on('error', (err) => {
      reject(err);
    });

    req.on('timeout', () => {
      req.destroy();
      reject(new Error(`Request timeout after ${options.timeout}ms`));
    });

    req.end(payload);
  });
};
