export interface Rectangle {
  readonly width: number;
  readonly height: number;
}

export interface RatioSpec {
  readonly width: number;
  readonly height: number;
}

export interface FitResult {
  width: number;
  height: number;
  ratioWidth: number;
  ratioHeight: number;
}

export interface CatalogWarning {
  token: string;
  message: string;
}

export interface Catalog<T extends Rectangle | RatioSpec = RatioSpec> {
  entries: T[];
  warnings: CatalogWarning[];
}
