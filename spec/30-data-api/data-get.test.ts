import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHttpApp } from '@src/servers/http.js';
import { loadConfig } from '@src/lib/config.js';
import { FakeDatabase, catalogResponder, storesTable, type FakeTable } from '@spec/helpers/fake-database.js';

const TOKEN = 'test-token';
const AUTH = { Authorization: `Bearer ${TOKEN}` };

function createApp(tables: FakeTable[], env: NodeJS.ProcessEnv = {}) {
    const db = new FakeDatabase(catalogResponder(tables));
    const config = loadConfig({ API_TOKEN: TOKEN, ...env });
    const app = createHttpApp({ config, adapters: db.factory });
    return { app, db };
}

describe('GET /api/data', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('returns data, columns and pagination', async () => {
        const { app } = createApp([storesTable(250)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores&page=3&page_size=100', {
            headers: AUTH,
        });

        expect(res.status).toBe(200);
        const body = await res.json();
        expect(body).toHaveProperty('data.length', 50);
        expect(body).toHaveProperty('data.0', { id: 201, name: 'Store 201', district: 'north' });
        expect(body).toHaveProperty('columns', [
            { name: 'id', type: 'integer', nullable: false },
            { name: 'name', type: 'text', nullable: true },
            { name: 'district', type: 'text', nullable: true },
        ]);
        expect(body).toHaveProperty('pagination', { total_items: 250, page: 3, page_size: 100, total_pages: 3 });
    });

    test('defaults to page 1 of 100', async () => {
        const { app, db } = createApp([storesTable(150)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores', { headers: AUTH });

        expect(res.status).toBe(200);
        expect(await res.json()).toHaveProperty('pagination', {
            total_items: 150,
            page: 1,
            page_size: 100,
            total_pages: 2,
        });
        expect(db.calls[3].params).toEqual([100, 0]);
    });

    test('passes the district filter through', async () => {
        const { app, db } = createApp([storesTable(10)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores&district=south', {
            headers: AUTH,
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toHaveProperty('pagination.total_items', 5);
        expect(db.calls[2].params).toEqual(['south']);
    });

    test('rejects a missing token with 401 and a bearer challenge', async () => {
        const { app, db } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores');

        expect(res.status).toBe(401);
        expect(res.headers.get('WWW-Authenticate')).toBe('Bearer');
        expect(await res.json()).toEqual({ detail: 'Invalid authentication token' });
        expect(db.calls).toHaveLength(0);
    });

    test('rejects a wrong token with 401', async () => {
        const { app } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores', {
            headers: { Authorization: 'Bearer not-the-token' },
        });

        expect(res.status).toBe(401);
        expect(await res.json()).toEqual({ detail: 'Invalid authentication token' });
    });

    test('rejects every token when none is configured', async () => {
        const { app } = createApp([storesTable(1)], { API_TOKEN: '' });

        const res = await app.request('/api/data?schema_name=public&table_name=stores', {
            headers: { Authorization: 'Bearer ' },
        });

        expect(res.status).toBe(401);
    });

    test('returns 404 for an unknown table', async () => {
        const { app, db } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=ghost', { headers: AUTH });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: "Table 'public.ghost' not found" });
        expect(db.calls).toHaveLength(1);
    });

    test('returns 404 for a table without columns', async () => {
        const { app } = createApp([{ schema: 'public', name: 'husk', columns: [], rows: [] }]);

        const res = await app.request('/api/data?schema_name=public&table_name=husk', { headers: AUTH });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: "No columns found for table 'public.husk'" });
    });

    test('returns 500 when the pagination column is missing', async () => {
        const { app } = createApp([storesTable(1)], { PAGINATION_COLUMN: 'store_id' });

        const res = await app.request('/api/data?schema_name=public&table_name=stores', { headers: AUTH });

        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({ detail: "Pagination column 'store_id' not found in table columns" });
    });

    test('returns 500 with the driver message on query failure', async () => {
        const db = new FakeDatabase(() => {
            throw new Error('password authentication failed for user "postgres"');
        });
        const app = createHttpApp({ config: loadConfig({ API_TOKEN: TOKEN }), adapters: db.factory });

        const res = await app.request('/api/data?schema_name=public&table_name=stores', { headers: AUTH });

        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({
            detail: 'Error checking table existence: password authentication failed for user "postgres"',
        });
    });

    test('returns 422 when table_name is missing', async () => {
        const { app, db } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public', { headers: AUTH });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ detail: 'table_name is required' });
        expect(db.calls).toHaveLength(0);
    });

    test('returns 422 for page_size above 1000', async () => {
        const { app } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores&page_size=1001', {
            headers: AUTH,
        });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ detail: expect.stringMatching(/^page_size: /) });
    });

    test('returns 422 for page 0', async () => {
        const { app } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores&page=0', { headers: AUTH });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ detail: expect.stringMatching(/^page: /) });
    });

    test('returns 422 for a page past the largest addressable one', async () => {
        const { app, db } = createApp([storesTable(1)]);

        const res = await app.request('/api/data?schema_name=public&table_name=stores&page=10000000000000000000000', {
            headers: AUTH,
        });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ detail: 'page: Number must be less than or equal to 9007199254740' });
        expect(db.calls).toHaveLength(0);
    });

    test('returns 422 for identifiers outside the allow-list', async () => {
        const { app, db } = createApp([storesTable(1)]);
        const table = encodeURIComponent('stores"; DROP TABLE stores; --');

        const res = await app.request(`/api/data?schema_name=public&table_name=${table}`, { headers: AUTH });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ detail: 'table_name must be a plain SQL identifier' });
        expect(db.calls).toHaveLength(0);
    });
});

describe('GET /health', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('is public and does not touch the database', async () => {
        const { app, db } = createApp([]);

        const res = await app.request('/health');

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok' });
        expect(db.connects).toBe(0);
    });
});

describe('unknown routes', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('return 404 with a detail body', async () => {
        const { app } = createApp([]);

        const res = await app.request('/nope');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ detail: 'Not Found' });
    });

    test('under /api still require a token first', async () => {
        const { app } = createApp([]);

        const res = await app.request('/api/nope');

        expect(res.status).toBe(401);
    });
});

describe('CORS', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('answers a preflight without a token, echoing origin and requested headers', async () => {
        const { app, db } = createApp([storesTable(1)]);

        const res = await app.request('/api/data', {
            method: 'OPTIONS',
            headers: {
                Origin: 'https://dash.example',
                'Access-Control-Request-Method': 'GET',
                'Access-Control-Request-Headers': 'authorization,x-request-id',
            },
        });

        expect(res.status).toBe(204);
        expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://dash.example');
        expect(res.headers.get('Access-Control-Allow-Credentials')).toBe('true');
        expect(res.headers.get('Access-Control-Allow-Headers')).toBe('authorization,x-request-id');
        expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET,HEAD,POST,PUT,PATCH,DELETE,OPTIONS');
        expect(db.calls).toHaveLength(0);
    });

    test('echoes the origin on simple requests', async () => {
        const { app } = createApp([]);

        const res = await app.request('/health', { headers: { Origin: 'https://dash.example' } });

        expect(res.status).toBe(200);
        expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://dash.example');
        expect(res.headers.get('Access-Control-Allow-Credentials')).toBe('true');
    });
});
