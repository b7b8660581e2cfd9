export type Page =
  | 'home'
  | 'models-by-company'
  | 'top-brands'
  | 'transmission-vs-type'
  | 'manufacturer-vs-drive'
  | 'brand-heatmap';

export type SummaryMetrics = {
  totalListings: number;
  uniqueManufacturers: number;
  uniqueModels: number;
};

export type SummaryResponse = SummaryMetrics & {
  loadedAt: string | null;
  loadError: string | null;
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

export type CountTable = {
  groups: string[];
  rows: Array<{ category: string; counts: Record<string, number> }>;
};

export type BrandHeatmap = {
  manufacturer: string;
  centerLat: number;
  centerLong: number;
  points: Array<[number, number]>;
};

export type ViewInputs = {
  manufacturer?: string;
  search?: string;
};

type ViewBase<P extends Page, D> = {
  page: P;
  title: string;
  data: D | null;
  message: string | null;
  loadError: string | null;
};

export type ViewModel =
  | ViewBase<'home', SummaryMetrics>
  | (ViewBase<'models-by-company', { manufacturer: string; search: string; models: ModelSummary[] }> & {
      manufacturers: string[];
    })
  | ViewBase<'top-brands', BrandFrequency[]>
  | ViewBase<'transmission-vs-type', CountTable>
  | ViewBase<'manufacturer-vs-drive', CountTable>
  | (ViewBase<'brand-heatmap', BrandHeatmap> & { manufacturers: string[] });

export type ViewFor<P extends Page> = Extract<ViewModel, { page: P }>;
