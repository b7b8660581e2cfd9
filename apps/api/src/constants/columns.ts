import { Page } from '../types/index.js';

export const REQUIRED_COLUMNS = [
  'manufacturer',
  'model',
  'year',
  'price',
  'lat',
  'long',
  'cylinders',
  'fuel',
  'drive'
] as const;

export const OPTIONAL_COLUMNS = ['type', 'transmission'] as const;

// Cells holding one of these (after trimming) are missing values.
export const NULL_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null'
]);

export const MISSING_VALUE = 'N/A';

export const DEFAULT_TOP_BRANDS = 10;

export const PAGES: readonly Page[] = [
  'home',
  'models-by-company',
  'top-brands',
  'transmission-vs-type',
  'manufacturer-vs-drive',
  'brand-heatmap'
];

export const INITIAL_PAGE: Page = 'home';

export const isPage = (value: string): value is Page => PAGES.some((page) => page === value);
