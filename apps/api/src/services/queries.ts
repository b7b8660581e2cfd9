import { DEFAULT_TOP_BRANDS, MISSING_VALUE } from '../constants/columns.js';
import {
  BrandFrequency,
  BrandHeatmap,
  CategoryPair,
  CountTable,
  Dataset,
  Listing,
  ModelSummary,
  SummaryMetrics
} from '../types/index.js';
import { average, countDistinct, median, mode } from '../utils/stats.js';

export const summaryMetrics = (dataset: Dataset): SummaryMetrics => ({
  totalListings: dataset.listings.length,
  uniqueManufacturers: countDistinct(dataset.listings.map((listing) => listing.manufacturer)),
  uniqueModels: countDistinct(dataset.listings.map((listing) => listing.model))
});

export const listManufacturers = (dataset: Dataset): string[] =>
  Array.from(new Set(dataset.listings.map((listing) => listing.manufacturer))).sort(compareText);

/**
 * One summary per model of `manufacturer`, ordered by model name. `search` keeps only
 * models whose name contains it, ignoring case.
 */
export function modelsForManufacturer(
  dataset: Dataset,
  manufacturer: string,
  search?: string
): ModelSummary[] {
  const needle = search?.toLowerCase() ?? '';
  const groups = new Map<string, Listing[]>();

  dataset.listings.forEach((listing) => {
    if (listing.manufacturer !== manufacturer) {
      return;
    }
    if (needle && !listing.model.toLowerCase().includes(needle)) {
      return;
    }

    const group = groups.get(listing.model);
    if (group) {
      group.push(listing);
    } else {
      groups.set(listing.model, [listing]);
    }
  });

  return Array.from(groups.keys())
    .sort(compareText)
    .map((model) => summarizeModel(model, groups.get(model) ?? []));
}

export function topManufacturers(dataset: Dataset, n = DEFAULT_TOP_BRANDS): BrandFrequency[] {
  const counts = new Map<string, number>();
  dataset.listings.forEach((listing) => {
    counts.set(listing.manufacturer, (counts.get(listing.manufacturer) ?? 0) + 1);
  });

  // Array.prototype.sort is stable, so equal counts keep first-seen order.
  return Array.from(counts, ([manufacturer, count]) => ({ manufacturer, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, n));
}

export const transmissionByType = (dataset: Dataset): CategoryPair[] =>
  dataset.listings.map((listing) => ({ category: listing.transmission, group: listing.type }));

export const driveByManufacturer = (dataset: Dataset): CategoryPair[] =>
  dataset.listings.map((listing) => ({ category: listing.manufacturer, group: listing.drive }));

/**
 * Buckets pairs into per-category counts for grouped bar charts. Pairs with a null
 * side are left out; categories and groups keep the order they first appear in.
 */
export function countPairs(pairs: readonly CategoryPair[]): CountTable {
  const rows = new Map<string, Map<string, number>>();
  const groups = new Set<string>();

  pairs.forEach(({ category, group }) => {
    if (category === null || group === null) {
      return;
    }

    groups.add(group);
    const counts = rows.get(category) ?? new Map<string, number>();
    counts.set(group, (counts.get(group) ?? 0) + 1);
    rows.set(category, counts);
  });

  return {
    groups: Array.from(groups),
    rows: Array.from(rows, ([category, counts]) => ({ category, counts: Object.fromEntries(counts) }))
  };
}

export function brandHeatPoints(dataset: Dataset, manufacturer: string): BrandHeatmap | null {
  const listings = dataset.listings.filter((listing) => listing.manufacturer === manufacturer);
  const centerLat = average(listings.map((listing) => listing.latitude));
  const centerLong = average(listings.map((listing) => listing.longitude));

  if (centerLat === null || centerLong === null) {
    return null;
  }

  return {
    centerLat,
    centerLong,
    points: listings.map((listing) => [listing.latitude, listing.longitude])
  };
}

function summarizeModel(model: string, listings: Listing[]): ModelSummary {
  const pick = (field: 'drive' | 'type' | 'transmission' | 'fuel' | 'cylinders') =>
    mode(listings.map((listing) => listing[field])) ?? MISSING_VALUE;

  return {
    model,
    averagePrice: average(listings.map((listing) => listing.price)) ?? 0,
    medianYear: Math.trunc(median(listings.map((listing) => listing.year)) ?? 0),
    drive: pick('drive'),
    type: pick('type'),
    transmission: pick('transmission'),
    fuel: pick('fuel'),
    cylinders: pick('cylinders')
  };
}

function compareText(a: string, b: string) {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
