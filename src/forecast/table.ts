import type { ForecastTable, ForecastTableKind, ProjectedRow, Sample } from "../types.js";
import { projectRelativeHumidity } from "../utils/psychrometrics.js";
import { formatDayLabel, formatHourLabel } from "../utils/time.js";
import { assertReferenceTemperatures } from "./referenceTemperatures.js";

const TITLES: Record<ForecastTableKind, string> = {
  hourly: "Hourly",
  daily: "Daily"
};

function labelFor(kind: ForecastTableKind, sample: Sample): string {
  return kind === "hourly" ? formatHourLabel(sample.time) : formatDayLabel(sample.time);
}

export function projectSample(kind: ForecastTableKind, sample: Sample, referenceTempsC: readonly number[]): ProjectedRow {
  return {
    label: labelFor(kind, sample),
    temp_c: sample.temp_c,
    projected_rh_pct: projectRelativeHumidity(sample.temp_c, sample.rh_pct, referenceTempsC)
  };
}

export function assembleForecastTable(params: {
  kind: ForecastTableKind;
  referenceTempsC: readonly number[];
  samples: readonly Sample[];
}): ForecastTable {
  const { kind, referenceTempsC, samples } = params;
  assertReferenceTemperatures(referenceTempsC);

  return {
    kind,
    title: TITLES[kind],
    reference_temps_c: referenceTempsC,
    rows: samples.map((sample) => projectSample(kind, sample, referenceTempsC))
  };
}

export function formatTemperature(tempC: number): string {
  return `${tempC.toFixed(1)}°C`;
}

export function formatHumidity(rhPct: number): string {
  return `${rhPct.toFixed(1)}%`;
}

/** Display grid: header row first, then one row per projected sample. */
export function formatForecastTable(table: ForecastTable): string[][] {
  const header = [table.title, ...table.reference_temps_c.map(formatTemperature)];
  const rows = table.rows.map((row) => [
    `${row.label} (${formatTemperature(row.temp_c)})`,
    ...row.projected_rh_pct.map(formatHumidity)
  ]);
  return [header, ...rows];
}
