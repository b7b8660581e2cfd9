import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from '../app.js';
import { DatasetSource, emptyDataset } from '../services/dataset.js';
import { makeDataset, makeListing } from './helpers.js';

const dataset = makeDataset([
  makeListing({ manufacturer: 'honda', model: 'civic' }),
  makeListing({ manufacturer: 'ford', model: 'f-150', drive: '4wd' }),
  makeListing({ manufacturer: 'honda', model: 'accord' })
]);

const startServer = async (source: DatasetSource) => {
  const server = createApp(source).listen(0);
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
};

const stopServer = (server: Server) =>
  new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));

describe('api routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer(async () => dataset));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.status).toBe('ok');
  });

  it('serves summary metrics with the load state', async () => {
    const response = await fetch(`${baseUrl}/api/metrics/summary`);

    expect(await response.json()).toEqual({
      totalListings: 3,
      uniqueManufacturers: 2,
      uniqueModels: 3,
      loadedAt: '2024-01-01T00:00:00.000Z',
      loadError: null
    });
  });

  it('lists manufacturers', async () => {
    const response = await fetch(`${baseUrl}/api/manufacturers`);

    expect(await response.json()).toEqual({ data: ['ford', 'honda'] });
  });

  it('renders a view with query inputs', async () => {
    const response = await fetch(`${baseUrl}/api/views/models-by-company?manufacturer=honda&search=CIV`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.page).toBe('models-by-company');
    expect(body.data.models).toHaveLength(1);
    expect(body.data.models[0].model).toBe('civic');
    expect(body.loadError).toBeNull();
  });

  it('honours the top brands limit', async () => {
    const response = await fetch(`${baseUrl}/api/views/top-brands?limit=1`);
    const body = await response.json();

    expect(body.data).toEqual([{ manufacturer: 'honda', count: 2 }]);
  });

  it('rejects an invalid limit', async () => {
    const response = await fetch(`${baseUrl}/api/views/top-brands?limit=abc`);

    expect(response.status).toBe(400);
  });

  it('returns 404 for an unknown page', async () => {
    const response = await fetch(`${baseUrl}/api/views/settings`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Unknown page: settings' });
  });

  it('accepts no request bodies', async () => {
    const response = await fetch(`${baseUrl}/api/views/home`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ manufacturer: 'honda' })
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Route not found' });
  });

  it('returns 404 for an unknown route', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Route not found' });
  });
});

describe('api routes after a failed load', () => {
  let server: Server;
  let baseUrl: string;
  const failed = emptyDataset('Error loading data: Missing required columns: price');

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer(async () => failed));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  it('surfaces the load error alongside the no-data message', async () => {
    const response = await fetch(`${baseUrl}/api/views/manufacturer-vs-drive`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.data).toBeNull();
    expect(body.message).toBe('Data not loaded.');
    expect(body.loadError).toBe('Error loading data: Missing required columns: price');
  });
});
