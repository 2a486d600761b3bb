import { describe, it, expect } from 'vitest';
import { ApiError, AuthenticationError, ConnectionClosedError, ErrorCode } from '../errors/index.js';
import { silentLogger } from '../logging/logger.js';
import { RestTransport } from '../transports/rest-transport.js';
import { createQueryId } from '../types/index.js';
import { createMockFetch, jsonResponse, type Reply } from './helpers/mock-fetch.js';
import { StaticAuth } from './helpers/static-auth.js';

const BASE = 'https://tenant.example.com/services/data/v61.0/ssot/query-sql';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const QUERY_ID = createQueryId('q-1');

function setup(replies: Reply[], options: { dataspace?: string; requestTimeoutMs?: number } = {}) {
  const mock = createMockFetch(...replies);
  const auth = new StaticAuth();
  const transport = new RestTransport(auth, silentLogger, {
    fetch: mock.fetch,
    apiVersion: 'v61.0',
    requestTimeoutMs: options.requestTimeoutMs ?? 1_000,
    dataspace: options.dataspace,
  });
  return { mock, auth, transport };
}

describe('RestTransport', () => {
  describe('submitQuery', () => {
    it('posts the statement with parameters and maps the state', async () => {
      const { mock, transport } = setup([jsonResponse({ queryId: 'q-1', status: 'InProgress' })]);

      const status = await transport.submitQuery('SELECT Id FROM Contact WHERE Name = ?', ['Ada']);

      expect(status).toEqual({ queryId: 'q-1', phase: 'running' });
      const request = mock.requests[0];
      expect(request?.url).toBe(BASE);
      expect(request?.method).toBe('POST');
      expect(request?.headers.authorization).toBe('Bearer token-1');
      expect(request?.headers['content-type']).toBe('application/json');
      expect(request?.headers['x-request-id']).toMatch(UUID_PATTERN);
      expect(mock.json(0)).toEqual({
        sql: 'SELECT Id FROM Contact WHERE Name = ?',
        sqlParameters: ['Ada'],
      });
    });

    it('sends the dataspace when configured', async () => {
      const { mock, transport } = setup([jsonResponse({ queryId: 'q-1', status: 'Queued' })], {
        dataspace: 'sales',
      });

      await transport.submitQuery('SELECT 1');

      expect(mock.json(0)).toEqual({ sql: 'SELECT 1', dataspace: 'sales' });
    });

    it('carries the server failure reason', async () => {
      const { transport } = setup([
        jsonResponse({ queryId: 'q-1', status: 'Failed', errorMessage: 'Unknown column: Foo' }),
      ]);

      const status = await transport.submitQuery('SELECT Foo FROM Contact');

      expect(status.phase).toBe('failed');
      expect(status.error).toBe('Unknown column: Foo');
    });
  });

  describe('getQueryStatus', () => {
    it('reads columns and the row total', async () => {
      const { mock, transport } = setup([
        jsonResponse({
          queryId: 'q-1',
          status: 'Finished',
          columns: [
            { name: 'Id', type: 'VARCHAR', nullable: false },
            { name: 'Amount', type: 'DECIMAL(18,2)', precision: 18, scale: 2 },
          ],
          totalRows: 2,
        }),
      ]);

      const status = await transport.getQueryStatus(QUERY_ID);

      expect(mock.requests[0]?.url).toBe(`${BASE}/q-1`);
      expect(mock.requests[0]?.method).toBe('GET');
      expect(status).toEqual({
        queryId: 'q-1',
        phase: 'finished',
        totalRows: 2,
        columns: [
          { name: 'Id', declaredType: 'VARCHAR', nullable: false },
          { name: 'Amount', declaredType: 'DECIMAL(18,2)', nullable: true, precision: 18, scale: 2 },
        ],
      });
    });

    it('rejects an unknown state as malformed', async () => {
      const { transport } = setup([jsonResponse({ queryId: 'q-1', status: 'Paused' })]);

      await expect(transport.getQueryStatus(QUERY_ID)).rejects.toMatchObject({
        name: 'ApiError',
        code: ErrorCode.MALFORMED_RESPONSE,
        message: 'Unknown query state: Paused',
      });
    });

    it('rejects a body without a query id as malformed', async () => {
      const { transport } = setup([jsonResponse({ status: 'Running' })]);

      await expect(transport.getQueryStatus(QUERY_ID)).rejects.toMatchObject({
        code: ErrorCode.MALFORMED_RESPONSE,
      });
    });

    it('rejects a body that is not JSON as malformed', async () => {
      const { transport } = setup([new Response('not json', { status: 200 })]);

      await expect(transport.getQueryStatus(QUERY_ID)).rejects.toMatchObject({
        code: ErrorCode.MALFORMED_RESPONSE,
        message: 'Response body is not valid JSON',
      });
    });
  });

  describe('getQueryResults', () => {
    it('requests the page window and aligns object rows with the columns', async () => {
      const { mock, transport } = setup([
        jsonResponse({
          queryId: 'q-1',
          status: 'Finished',
          columns: [
            { name: 'Id', type: 'VARCHAR' },
            { name: 'Amount', type: 'NUMBER' },
          ],
        }),
        jsonResponse({ data: [{ Amount: 10.5, Id: 'a' }, ['b', 2]], totalRows: 2 }),
      ]);
      await transport.getQueryStatus(QUERY_ID);

      const page = await transport.getQueryResults(QUERY_ID, 0, 2);

      expect(mock.requests[1]?.url).toBe(`${BASE}/q-1/rows?offset=0&rowLimit=2`);
      expect(page).toEqual({
        rows: [
          ['a', 10.5],
          ['b', 2],
        ],
        offset: 0,
        totalRows: 2,
        isLast: true,
      });
    });

    it('keeps the key order of object rows when columns are unknown', async () => {
      const { transport } = setup([jsonResponse({ data: [{ Name: 'Ada', Id: 'c-1' }] })]);

      const page = await transport.getQueryResults(QUERY_ID, 0, 10);

      expect(page.rows).toEqual([['Ada', 'c-1']]);
    });

    it('forgets the columns of a query once its last page is served', async () => {
      const { transport } = setup([
        jsonResponse({
          queryId: 'q-1',
          status: 'Finished',
          columns: [
            { name: 'Id', type: 'VARCHAR' },
            { name: 'Name', type: 'VARCHAR' },
          ],
        }),
        jsonResponse({ data: [{ Name: 'Ada', Id: 'c-1' }], nextOffset: 1 }),
        jsonResponse({ data: [{ Name: 'Grace', Id: 'c-2' }], done: true }),
        jsonResponse({ data: [{ Name: 'Grace', Id: 'c-2' }], done: true }),
      ]);
      await transport.getQueryStatus(QUERY_ID);

      const first = await transport.getQueryResults(QUERY_ID, 0, 1);
      const last = await transport.getQueryResults(QUERY_ID, 1, 1);
      const again = await transport.getQueryResults(QUERY_ID, 1, 1);

      expect(first.rows).toEqual([['c-1', 'Ada']]);
      expect(last).toMatchObject({ rows: [['c-2', 'Grace']], isLast: true });
      expect(again.rows).toEqual([['Grace', 'c-2']]);
    });

    it.each([
      { name: 'a full page with a next offset', offset: 0, body: { data: [[1], [2]], nextOffset: 2 }, isLast: false },
      { name: 'the done flag', offset: 0, body: { data: [[1], [2]], done: true }, isLast: true },
      { name: 'a null next offset', offset: 0, body: { data: [[1], [2]], nextOffset: null }, isLast: true },
      { name: 'a negative next offset', offset: 0, body: { data: [[1], [2]], nextOffset: -1 }, isLast: true },
      { name: 'reaching the total', offset: 2, body: { data: [[1], [2]], totalRows: 4 }, isLast: true },
      { name: 'a short page', offset: 0, body: { data: [[1]] }, isLast: true },
    ])('decides the last page from $name', async ({ offset, body, isLast }) => {
      const { transport } = setup([jsonResponse(body)]);

      const page = await transport.getQueryResults(QUERY_ID, offset, 2);

      expect(page.isLast).toBe(isLast);
    });
  });

  describe('getMetadata', () => {
    const TENANT_METADATA = {
      metadata: [
        {
          name: 'Individual__dlm',
          displayName: 'Individual',
          category: 'Profile',
          fields: [
            { name: 'Id__c', displayName: 'Individual Id', type: 'STRING' },
            { name: 'BirthDate__c', displayName: 'Birth Date', type: 'DATE_TIME' },
          ],
          primaryKeys: [{ name: 'Id__c', displayName: 'Individual Id', indexOrder: '1' }],
        },
        { name: 'WebVisit__dlm', category: 'Engagement' },
      ],
    };

    it('requests the filtered tables and normalizes the entries', async () => {
      const { mock, transport } = setup([jsonResponse(TENANT_METADATA)]);

      const tables = await transport.getMetadata({ entityCategory: 'Profile', entityType: ' ', entityName: '' });

      expect(mock.requests[0]?.url).toBe('https://tenant.example.com/api/v1/metadata?entityCategory=Profile');
      expect(mock.requests[0]?.method).toBe('GET');
      expect(mock.requests[0]?.headers.authorization).toBe('Bearer token-1');
      expect(tables).toEqual([
        {
          name: 'Individual__dlm',
          displayName: 'Individual',
          category: 'Profile',
          fields: [
            { name: 'Id__c', displayName: 'Individual Id', type: 'STRING' },
            { name: 'BirthDate__c', displayName: 'Birth Date', type: 'DATE_TIME' },
          ],
          primaryKeys: [{ name: 'Id__c', displayName: 'Individual Id', indexOrder: 1 }],
          relationships: [],
        },
        { name: 'WebVisit__dlm', category: 'Engagement', fields: [], primaryKeys: [], relationships: [] },
      ]);
    });

    it('sends no query string without filters and accepts an empty body', async () => {
      const { mock, transport } = setup([jsonResponse({})]);

      expect(await transport.getMetadata({})).toEqual([]);
      expect(mock.requests[0]?.url).toBe('https://tenant.example.com/api/v1/metadata');
    });

    it('rejects a table without a name as malformed', async () => {
      const { transport } = setup([jsonResponse({ metadata: [{ displayName: 'Nameless' }] })]);

      await expect(transport.getMetadata({})).rejects.toMatchObject({ code: ErrorCode.MALFORMED_RESPONSE });
    });

    it('re-authenticates once after a 401', async () => {
      const { auth, transport } = setup([
        jsonResponse({ message: 'Session expired' }, 401),
        jsonResponse(TENANT_METADATA),
      ]);

      const tables = await transport.getMetadata({});

      expect(tables.map((table) => table.name)).toEqual(['Individual__dlm', 'WebVisit__dlm']);
      expect(auth.invalidateCalls).toBe(1);
    });
  });

  describe('auth expiry', () => {
    it('re-authenticates once and retries after a 401', async () => {
      const { mock, auth, transport } = setup([
        jsonResponse({ message: 'Session expired' }, 401),
        jsonResponse({ queryId: 'q-1', status: 'Running' }),
      ]);

      const status = await transport.getQueryStatus(QUERY_ID);

      expect(status.phase).toBe('running');
      expect(auth.invalidateCalls).toBe(1);
      expect(mock.requests.map((request) => request.headers.authorization)).toEqual([
        'Bearer token-1',
        'Bearer token-2',
      ]);
    });

    it('raises AuthenticationError on a second consecutive 401', async () => {
      const { mock, transport } = setup([
        jsonResponse({ message: 'Session expired' }, 401),
        jsonResponse({ message: 'Session expired' }, 401),
      ]);

      const failure = transport.getQueryStatus(QUERY_ID);

      await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
      await expect(failure).rejects.toMatchObject({
        message: 'Access token rejected after re-authentication',
        statusCode: 401,
      });
      expect(mock.requests).toHaveLength(2);
    });
  });

  describe('errors', () => {
    it('raises ApiError for other statuses without retrying', async () => {
      const { mock, auth, transport } = setup([new Response('boom', { status: 500 })]);

      const error = await transport.getQueryStatus(QUERY_ID).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        code: ErrorCode.API_ERROR,
        statusCode: 500,
        message: 'Request failed with status 500: boom',
        correlationId: mock.requests[0]?.headers['x-request-id'],
      });
      expect(auth.invalidateCalls).toBe(0);
      expect(mock.requests).toHaveLength(1);
    });

    it('times out a request that never answers', async () => {
      const { transport } = setup(
        [
          (_request, signal) =>
            new Promise<Response>((_resolve, reject) => {
              signal?.addEventListener('abort', () => {
                const abort = new Error('This operation was aborted');
                abort.name = 'AbortError';
                reject(abort);
              });
            }),
        ],
        { requestTimeoutMs: 10 }
      );

      await expect(transport.getQueryStatus(QUERY_ID)).rejects.toMatchObject({
        code: ErrorCode.REQUEST_TIMEOUT,
        message: 'Request timed out after 10ms',
      });
    });
  });

  describe('close', () => {
    it('is idempotent and rejects later calls without a request', async () => {
      const { mock, transport } = setup([]);

      await transport.close();
      await transport.close();

      expect(transport.isClosed).toBe(true);
      await expect(transport.submitQuery('SELECT 1')).rejects.toBeInstanceOf(ConnectionClosedError);
      expect(mock.requests).toHaveLength(0);
    });
  });
});
