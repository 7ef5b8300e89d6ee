export type Predicate =
  | { type: "greater_or_equal"; threshold: number }
  | { type: "less_than"; threshold: number }
  | { type: "and"; left: Predicate; right: Predicate };

export interface Rule {
  title: string;
  predicate: Predicate;
  fillColor: string;
  strokeColor: string;
  strokeWidth: number;
}

export interface StyleSheet {
  name: string;
  property: string;
  rules: readonly Rule[];
}

export interface Style {
  title: string;
  fillColorHex: string;
  strokeColorHex: string;
  strokeWidthPx: number;
}

/** Rule as it comes out of a style document, before validation. */
export interface RawRule {
  title: string;
  predicate: unknown;
  fillColor: unknown;
  strokeColor: unknown;
  strokeWidth?: unknown;
  /** Number of PolygonSymbolizers the rule declared; only set by the SLD reader. */
  polygonSymbolizers?: number;
}

export interface StyleDocument {
  name: string;
  property?: string;
  rules: RawRule[];
}

/** Half-open interval [lower, upper) over the attribute value. */
export interface Interval {
  lower: number;
  upper: number;
}

export interface CheckResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
