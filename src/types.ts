import type { DateTime } from "luxon";

/**
 * Civil (wall-clock) date-time. Always a luxon DateTime fixed to UTC and never
 * converted between zones: it only carries the local time the forecast reports.
 */
export type CivilDateTime = DateTime;

export interface Timestamped {
  readonly time: CivilDateTime;
}

export interface Sample extends Timestamped {
  readonly temp_c: number;
  readonly rh_pct: number; // 0-100
}

export interface DailyAverage {
  readonly date: CivilDateTime; // start of the civil day
  readonly temp_c_mean: number;
  readonly rh_pct_mean: number;
  readonly count: number;
}

export interface HourlyForecast {
  timezone: string;
  utc_offset_seconds: number;
  samples: Sample[];
}

export type ForecastTableKind = "hourly" | "daily";

export interface ProjectedRow {
  label: string;
  temp_c: number;
  projected_rh_pct: number[];
}

export interface ForecastTable {
  kind: ForecastTableKind;
  title: string;
  reference_temps_c: readonly number[];
  rows: ProjectedRow[];
}

export interface ForecastReport {
  hourly: ForecastTable;
  daily: ForecastTable;
}

export type Charset = "unicode" | "ascii";
