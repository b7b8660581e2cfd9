import { isPage } from '../constants/columns.js';
import { MissingColumnsError, UnknownPageError } from '../errors.js';
import {
  BrandHeatmapView,
  Dataset,
  HomeView,
  ManufacturerVsDriveView,
  ModelsByCompanyView,
  Page,
  TopBrandsView,
  TransmissionVsTypeView,
  ViewInputs,
  ViewModel
} from '../types/index.js';
import {
  brandHeatPoints,
  countPairs,
  driveByManufacturer,
  listManufacturers,
  modelsForManufacturer,
  summaryMetrics,
  topManufacturers,
  transmissionByType
} from './queries.js';

type ViewFor<P extends Page> = Extract<ViewModel, { page: P }>;

type ViewTable = { [P in Page]: (dataset: Dataset, inputs: ViewInputs) => ViewFor<P> };

const REQUIRED_COLUMNS_MESSAGE = 'Required columns are missing from the dataset.';

export const resolvePage = (value: string): Page => {
  if (!isPage(value)) {
    throw new UnknownPageError(value);
  }

  return value;
};

export const assertColumns = (dataset: Dataset, columns: readonly string[]) => {
  const missing = columns.filter((column) => !dataset.columns.has(column));
  if (missing.length) {
    throw new MissingColumnsError(missing);
  }
};

const home = (dataset: Dataset): HomeView => ({
  page: 'home',
  title: 'Used Vehicle Market Analysis Dashboard',
  data: summaryMetrics(dataset),
  message: null
});

function modelsByCompany(dataset: Dataset, inputs: ViewInputs): ModelsByCompanyView {
  const view: ModelsByCompanyView = {
    page: 'models-by-company',
    title: 'Models by Manufacturer',
    manufacturers: [],
    data: null,
    message: REQUIRED_COLUMNS_MESSAGE
  };

  if (!dataset.listings.length) {
    return view;
  }

  try {
    assertColumns(dataset, ['type', 'transmission']);
  } catch (error) {
    if (error instanceof MissingColumnsError) {
      return view;
    }
    throw error;
  }

  const manufacturers = listManufacturers(dataset);
  const manufacturer = pickManufacturer(manufacturers, inputs.manufacturer);
  const search = inputs.search ?? '';
  const hasListings = dataset.listings.some((listing) => listing.manufacturer === manufacturer);
  const models = hasListings ? modelsForManufacturer(dataset, manufacturer, search) : [];

  let message: string | null = null;
  if (!hasListings) {
    message = 'No models found.';
  } else if (!models.length) {
    message = 'No matching models found.';
  }

  return { ...view, manufacturers, data: { manufacturer, search, models }, message };
}

const topBrands = (dataset: Dataset, inputs: ViewInputs): TopBrandsView => ({
  page: 'top-brands',
  title: 'Most Listed Vehicle Brands',
  data: dataset.listings.length ? topManufacturers(dataset, inputs.limit) : null,
  message: dataset.listings.length ? null : "No data or 'manufacturer' column missing."
});

function transmissionVsType(dataset: Dataset): TransmissionVsTypeView {
  const view: TransmissionVsTypeView = {
    page: 'transmission-vs-type',
    title: 'Transmission vs Type',
    data: null,
    message: 'Data not loaded.'
  };

  if (!dataset.listings.length) {
    return view;
  }

  try {
    assertColumns(dataset, ['transmission', 'type']);
  } catch (error) {
    if (error instanceof MissingColumnsError) {
      return { ...view, message: REQUIRED_COLUMNS_MESSAGE };
    }
    throw error;
  }

  return { ...view, data: countPairs(transmissionByType(dataset)), message: null };
}

const manufacturerVsDrive = (dataset: Dataset): ManufacturerVsDriveView => ({
  page: 'manufacturer-vs-drive',
  title: 'Manufacturer vs Drive',
  data: dataset.listings.length ? countPairs(driveByManufacturer(dataset)) : null,
  message: dataset.listings.length ? null : 'Data not loaded.'
});

function brandHeatmap(dataset: Dataset, inputs: ViewInputs): BrandHeatmapView {
  const view: BrandHeatmapView = {
    page: 'brand-heatmap',
    title: 'Heatmap of Selected Brand',
    manufacturers: [],
    data: null,
    message: "Required columns ('manufacturer', 'lat', 'long') not found in dataset."
  };

  if (!dataset.listings.length) {
    return view;
  }

  const manufacturers = listManufacturers(dataset);
  const manufacturer = pickManufacturer(manufacturers, inputs.manufacturer);
  const heatmap = brandHeatPoints(dataset, manufacturer);

  if (!heatmap) {
    return { ...view, manufacturers, message: 'No data available for this manufacturer.' };
  }

  return { ...view, manufacturers, data: { ...heatmap, manufacturer }, message: null };
}

const views: ViewTable = {
  home,
  'models-by-company': modelsByCompany,
  'top-brands': topBrands,
  'transmission-vs-type': transmissionVsType,
  'manufacturer-vs-drive': manufacturerVsDrive,
  'brand-heatmap': brandHeatmap
};

/**
 * Computes the view for `page` from scratch. Selection inputs belong to the caller;
 * nothing is remembered between calls.
 */
export function renderView<P extends Page>(page: P, dataset: Dataset, inputs: ViewInputs = {}): ViewFor<P> {
  return views[page](dataset, inputs);
}

// Mirrors the picker, which preselects the first manufacturer in sorted order.
function pickManufacturer(manufacturers: string[], selected?: string) {
  return selected ?? manufacturers[0] ?? '';
}
