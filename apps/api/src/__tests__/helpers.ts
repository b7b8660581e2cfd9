import { fileURLToPath } from 'node:url';
import { Dataset, Listing } from '../types/index.js';

const ALL_COLUMNS = [
  'manufacturer',
  'model',
  'year',
  'price',
  'lat',
  'long',
  'cylinders',
  'fuel',
  'drive',
  'type',
  'transmission'
];

export const makeListing = (overrides: Partial<Listing> = {}): Listing => ({
  manufacturer: 'honda',
  model: 'civic',
  year: 2015,
  price: 10000,
  latitude: 40,
  longitude: -100,
  cylinders: '4 cylinders',
  fuel: 'gas',
  drive: 'fwd',
  type: 'sedan',
  transmission: 'automatic',
  ...overrides
});

export const makeDataset = (listings: Listing[], columns: string[] = ALL_COLUMNS): Dataset => ({
  listings,
  columns: new Set(columns),
  loadedAt: '2024-01-01T00:00:00.000Z',
  error: null
});

export const fixturePath = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
