export type Listing = {
  manufacturer: string;
  model: string;
  year: number;
  price: number;
  latitude: number;
  longitude: number;
  cylinders: string;
  fuel: string;
  drive: string;
  type: string | null;
  transmission: string | null;
};

export type Dataset = {
  listings: readonly Listing[];
  columns: ReadonlySet<string>;
  loadedAt: string | null;
  error: string | null;
};

export type SummaryMetrics = {
  totalListings: number;
  uniqueManufacturers: number;
  uniqueModels: number;
};

export type ModelSummary = {
  model: string;
  averagePrice: number;
  medianYear: number;
  drive: string;
  type: string;
  transmission: string;
  fuel: string;
  cylinders: string;
};

export type BrandFrequency = {
  manufacturer: string;
  count: number;
};

export type CategoryPair = {
  category: string | null;
  group: string | null;
};

export type CountTable = {
  groups: string[];
  rows: Array<{ category: string; counts: Record<string, number> }>;
};

export type HeatPoint = [latitude: number, longitude: number];

export type BrandHeatmap = {
  centerLat: number;
  centerLong: number;
  points: HeatPoint[];
};

export type Page =
  | 'home'
  | 'models-by-company'
  | 'top-brands'
  | 'transmission-vs-type'
  | 'manufacturer-vs-drive'
  | 'brand-heatmap';

export type ViewInputs = {
  manufacturer?: string;
  search?: string;
  limit?: number;
};

type ViewBase<P extends Page, D> = {
  page: P;
  title: string;
  data: D | null;
  message: string | null;
};

export type HomeView = ViewBase<'home', SummaryMetrics>;

export type ModelsByCompanyView = ViewBase<
  'models-by-company',
  { manufacturer: string; search: string; models: ModelSummary[] }
> & { manufacturers: string[] };

export type TopBrandsView = ViewBase<'top-brands', BrandFrequency[]>;

export type TransmissionVsTypeView = ViewBase<'transmission-vs-type', CountTable>;

export type ManufacturerVsDriveView = ViewBase<'manufacturer-vs-drive', CountTable>;

export type BrandHeatmapView = ViewBase<
  'brand-heatmap',
  BrandHeatmap & { manufacturer: string }
> & { manufacturers: string[] };

export type ViewModel =
  | HomeView
  | ModelsByCompanyView
  | TopBrandsView
  | TransmissionVsTypeView
  | ManufacturerVsDriveView
  | BrandHeatmapView;
