import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../app.js';
import { InMemoryDataProvider } from '../lib/dataProvider.js';
import { dataSummarySchema, queryResponseSchema } from '../../shared/schema.js';
import { sampleTable } from './helpers/fixtures.js';

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp(new InMemoryDataProvider(sampleTable()));
  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
});

function postQuery(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/query`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('GET /api/health', () => {
  it('reports the server is up', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'OK', message: 'Server is running' });
  });
});

describe('POST /api/query', () => {
  it('answers a question with an explanation and table', async () => {
    const res = await postQuery({ question: 'How many samples are there?' });
    expect(res.status).toBe(200);
    const body = queryResponseSchema.parse(await res.json());
    expect(body).toEqual({
      explanation: 'Total number of samples in the dataset: 5',
      table: { columns: ['Total Samples'], rows: [{ 'Total Samples': 5 }] },
    });
  });

  it('serializes empty results with a null table', async () => {
    const res = await postQuery({ question: 'show data for site 9' });
    const body = queryResponseSchema.parse(await res.json());
    expect(body).toEqual({ explanation: 'No data found for site 9.', table: null });
  });

  it('returns help for questions nothing understands', async () => {
    const res = await postQuery({ question: 'asdf1234' });
    const body = queryResponseSchema.parse(await res.json());
    expect(body.table?.columns).toEqual(['Example Questions']);
    expect(body.table?.rows).toHaveLength(6);
  });

  it('rejects a blank question', async () => {
    const res = await postQuery({ question: '   ' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Question is required' });
  });

  it('rejects a body without a question', async () => {
    const res = await postQuery({});
    expect(res.status).toBe(400);
  });
});

describe('GET /api/data/summary', () => {
  it('summarizes the loaded data', async () => {
    const res = await fetch(`${baseUrl}/api/data/summary`);
    expect(res.status).toBe(200);
    const summary = dataSummarySchema.parse(await res.json());
    expect(summary.totalSamples).toBe(5);
    expect(summary.totalSites).toBe(2);
    expect(summary.dateRange).toEqual({ start: '1990-01-15', end: '1992-07-15' });
    expect(summary.yearsCovered).toEqual([1990, 1991, 1992]);
  });
});

describe('unknown routes', () => {
  it('answers 404 as JSON', async () => {
    const res = await fetch(`${baseUrl}/api/nothing-here`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Endpoint not found' });
  });
});
