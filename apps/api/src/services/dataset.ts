import dayjs from 'dayjs';
import { createReadStream } from 'node:fs';
import { resolve } from 'node:path';
import type { Readable } from 'node:stream';
import Papa from 'papaparse';
import { z } from 'zod';
import { config } from '../config.js';
import { NULL_TOKENS, OPTIONAL_COLUMNS, REQUIRED_COLUMNS } from '../constants/columns.js';
import { DataLoadError } from '../errors.js';
import { Dataset, Listing } from '../types/index.js';

type CsvRow = Record<string, string | undefined>;

export type DatasetSource = () => Promise<Dataset>;

const listingSchema = z.object({
  manufacturer: z.string(),
  model: z.string(),
  year: z.number().int(),
  price: z.number().finite(),
  lat: z.number().finite(),
  long: z.number().finite(),
  cylinders: z.string(),
  fuel: z.string(),
  drive: z.string(),
  type: z.string().nullable(),
  transmission: z.string().nullable()
});

const NUMERIC_COLUMNS = new Set(['year', 'price', 'lat', 'long']);

export const emptyDataset = (error: string | null = null): Dataset => ({
  listings: [],
  columns: new Set(),
  loadedAt: null,
  error
});

/**
 * Streams and validates the listings CSV. Never rejects: a failed load comes back as an
 * empty dataset whose `error` holds the message to show the user.
 */
export async function readDataset(path: string): Promise<Dataset> {
  try {
    return await parseDataset(createReadStream(path, { encoding: 'utf8' }));
  } catch (error) {
    const loadError = toLoadError(error);
    console.error(`Failed to load dataset from ${path}`, loadError);
    return emptyDataset(`Error loading data: ${loadError.message}`);
  }
}

/**
 * Parses rows as they arrive so the source never has to fit in a single string.
 * Rejects with a DataLoadError on the first bad row and stops reading.
 */
export function parseDataset(input: Readable): Promise<Dataset> {
  return new Promise((resolvePromise, reject) => {
    const listings: Listing[] = [];
    const header = new Set<string>();
    let headerChecked = false;
    let line = 1;
    let failure: DataLoadError | null = null;

    const fail = (error: unknown) => {
      input.destroy();
      reject(toLoadError(error));
    };

    const checkHeader = () => {
      if (!headerChecked) {
        checkColumns(header);
        headerChecked = true;
      }
    };

    input.once('error', fail);

    Papa.parse<CsvRow>(input, {
      header: true,
      delimiter: ',',
      skipEmptyLines: true,
      transformHeader: (name) => {
        header.add(name);
        return name;
      },
      step: (result, parser) => {
        line += 1;
        try {
          checkHeader();

          const fatal = result.errors.find((error) => error.type !== 'FieldMismatch');
          if (fatal) {
            throw new DataLoadError(`${fatal.message} (line ${line})`);
          }

          const listing = toListing(result.data, line);
          if (listing) {
            listings.push(listing);
          }
        } catch (error) {
          failure = toLoadError(error);
          parser.abort();
        }
      },
      complete: () => {
        if (failure) {
          fail(failure);
          return;
        }

        try {
          checkHeader();
          resolvePromise({
            listings,
            columns: new Set([...header].filter((field) => isKnownColumn(field))),
            loadedAt: dayjs().toISOString(),
            error: null
          });
        } catch (error) {
          fail(error);
        }
      },
      error: fail
    });
  });
}

let pendingDataset: Promise<Dataset> | undefined;

export function getDataset(): Promise<Dataset> {
  if (pendingDataset === undefined) {
    pendingDataset = readDataset(resolve(process.cwd(), config.datasetPath));
  }

  return pendingDataset;
}

function checkColumns(fields: ReadonlySet<string>) {
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.has(column));
  if (missing.length) {
    throw new DataLoadError(`Missing required columns: ${missing.join(', ')}`);
  }
}

function toLoadError(error: unknown) {
  if (error instanceof DataLoadError) {
    return error;
  }

  return new DataLoadError(error instanceof Error ? error.message : String(error), { cause: error });
}

function toListing(row: CsvRow, line: number): Listing | null {
  if (REQUIRED_COLUMNS.some((column) => cell(row, column) === null)) {
    return null;
  }

  const raw = Object.fromEntries(
    [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS].map((column) => {
      const value = cell(row, column);
      return [column, value !== null && NUMERIC_COLUMNS.has(column) ? Number(value) : value];
    })
  );

  const parsed = listingSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new DataLoadError(`Invalid ${issue.path.join('.')} on line ${line}: ${issue.message}`);
  }

  const { lat, long, ...rest } = parsed.data;
  return { ...rest, latitude: lat, longitude: long };
}

function cell(row: CsvRow, column: string): string | null {
  const value = row[column];
  if (value === undefined || NULL_TOKENS.has(value.trim())) {
    return null;
  }

  return value;
}

function isKnownColumn(field: string) {
  return [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS].some((column) => column === field);
}
