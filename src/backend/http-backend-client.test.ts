/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { createServer, IncomingMessage, Server } from 'node:http';
import { AddressInfo } from 'node:net';
import { Readable } from 'node:stream';
import { text } from 'node:stream/consumers';
import { after, before, describe, it } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import { HttpBackendClient } from './http-backend-client.js';
import { BackendError, BackendRequest } from './types.js';

const log = createTestLogger({ suite: 'HttpBackendClient' });

function backendRequest(
  overrides: Partial<BackendRequest> = {},
): BackendRequest {
  return {
    method: 'GET',
    script: '/index.php',
    queryString: '',
    headers: { host: 'example.com', accept: 'text/html' },
    params: {
      SCRIPT_NAME: '/index.php',
      SCRIPT_FILENAME: '/srv/www/index.php',
      DOCUMENT_ROOT: '/srv/www',
      DOCUMENT_URI: '/index.php',
      REQUEST_URI: '/news',
      QUERY_STRING: '',
      REQUEST_METHOD: 'GET',
      SERVER_NAME: 'example.com',
    },
    protocol: 'http',
    ...overrides,
  };
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(
        typeof address === 'object' && address !== null ? address.port : 0,
      );
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

async function readBody(req: IncomingMessage): Promise<string> {
  return text(req);
}

describe('HttpBackendClient', () => {
  describe('requestHeaders', () => {
    it('should add forwarding and gateway parameter headers', () => {
      const client = new HttpBackendClient({
        log,
        backendUrl: 'http://127.0.0.1:1',
      });

      const headers = client.requestHeaders(
        backendRequest({
          headers: {
            host: 'example.com',
            connection: 'keep-alive',
            'x-forwarded-for': '10.0.0.1',
            'x-gateway-param-script_filename': '/etc/passwd',
            accept: 'text/html',
          },
          clientIp: '10.0.0.2',
          protocol: 'https',
        }),
      );

      assert.deepEqual(headers, {
        host: 'example.com',
        accept: 'text/html',
        'X-Forwarded-For': '10.0.0.1, 10.0.0.2',
        'X-Forwarded-Host': 'example.com',
        'X-Forwarded-Proto': 'https',
        'X-Gateway-Param-SCRIPT_NAME': '/index.php',
        'X-Gateway-Param-SCRIPT_FILENAME': '/srv/www/index.php',
        'X-Gateway-Param-DOCUMENT_ROOT': '/srv/www',
        'X-Gateway-Param-DOCUMENT_URI': '/index.php',
        'X-Gateway-Param-REQUEST_URI': '/news',
        'X-Gateway-Param-QUERY_STRING': '',
        'X-Gateway-Param-REQUEST_METHOD': 'GET',
        'X-Gateway-Param-SERVER_NAME': 'example.com',
      });
    });

    it('should omit X-Forwarded-For without a client address', () => {
      const client = new HttpBackendClient({
        log,
        backendUrl: 'http://127.0.0.1:1',
      });

      const headers = client.requestHeaders(backendRequest());

      assert.equal(headers['X-Forwarded-For'], undefined);
      assert.equal(headers['X-Forwarded-Proto'], 'http');
    });
  });

  describe('forward', () => {
    let server: Server;
    let client: HttpBackendClient;
    let received: { method?: string; url?: string; body: string }[];

    before(async () => {
      received = [];
      server = createServer((req, res) => {
        void readBody(req).then((body) => {
          received.push({ method: req.method, url: req.url, body });
          if (req.url?.startsWith('/slow') === true) {
            return;
          }
          res.writeHead(201, {
            'Content-Type': 'text/html; charset=utf-8',
            'X-Backend': req.headers['x-gateway-param-request_uri'],
          });
          res.end(`<p>${req.method} ${req.url}</p>`);
        });
      });
      const port = await listen(server);
      client = new HttpBackendClient({
        log,
        backendUrl: `http://127.0.0.1:${port}`,
        requestTimeoutMs: 200,
      });
    });

    after(async () => {
      await close(server);
    });

    it('should relay the backend status, headers and body', async () => {
      const response = await client.forward(
        backendRequest({ queryString: 'id=5' }),
      );

      assert.equal(response.status, 201);
      assert.equal(
        response.headers['content-type'],
        'text/html; charset=utf-8',
      );
      assert.equal(response.headers['x-backend'], '/news');
      assert.equal(response.headers['connection'], undefined);
      assert.equal(await text(response.body), '<p>GET /index.php?id=5</p>');
    });

    it('should percent-encode the script path', async () => {
      const response = await client.forward(
        backendRequest({ script: '/page?.php', queryString: 'a=1' }),
      );

      assert.equal(await text(response.body), '<p>GET /page%3F.php?a=1</p>');
    });

    it('should stream the request body for POST requests', async () => {
      const response = await client.forward(
        backendRequest({
          method: 'POST',
          script: '/form.php',
          body: Readable.from(['name=test']),
        }),
      );
      await text(response.body);

      assert.deepEqual(received[received.length - 1], {
        method: 'POST',
        url: '/form.php',
        body: 'name=test',
      });
    });

    it('should report a timeout', async () => {
      await assert.rejects(
        client.forward(backendRequest({ script: '/slow.php' })),
        (error: unknown) =>
          error instanceof BackendError && error.reason === 'timeout',
      );
    });

    it('should report an aborted request', async () => {
      const controller = new AbortController();
      controller.abort();

      await assert.rejects(
        client.forward(backendRequest({ signal: controller.signal })),
        (error: unknown) =>
          error instanceof BackendError && error.reason === 'aborted',
      );
    });

    it('should report an unreachable backend', async () => {
      const unused = createServer();
      const port = await listen(unused);
      await close(unused);
      const unreachable = new HttpBackendClient({
        log,
        backendUrl: `http://127.0.0.1:${port}`,
      });

      await assert.rejects(
        unreachable.forward(backendRequest()),
        (error: unknown) =>
          error instanceof BackendError && error.reason === 'connection',
      );
    });
  });
});
