import type { Charset, CivilDateTime, ForecastReport, Sample } from "./types.js";
import { aggregateByDay, dailyAverageToSample } from "./forecast/daily.js";
import { assembleForecastTable, formatForecastTable } from "./forecast/table.js";
import { windowSeries } from "./forecast/window.js";
import { renderTable, type RenderOptions } from "./render/boxTable.js";

export const EXPLANATION =
  "Opening the window will bring indoor humidity closer to the value indicated in the column " +
  "corresponding to the indoor temperature";

export const DEFAULT_HOURLY_ROWS = 10;
export const DEFAULT_DAILY_ROWS = 7;

export function buildForecastReport(params: {
  samples: readonly Sample[];
  now: CivilDateTime;
  referenceTempsC: readonly number[];
  hourlyRows?: number;
  dailyRows?: number;
}): ForecastReport {
  const { samples, now, referenceTempsC } = params;
  const hourlyRows = params.hourlyRows ?? DEFAULT_HOURLY_ROWS;
  const dailyRows = params.dailyRows ?? DEFAULT_DAILY_ROWS;

  const hourlySamples = windowSeries(samples, { bucket: "hour", step: 1, count: hourlyRows }, now);

  const dailySamples = windowSeries(
    aggregateByDay(samples).map(dailyAverageToSample),
    { bucket: "day", step: 1, count: dailyRows },
    now
  );

  return {
    hourly: assembleForecastTable({ kind: "hourly", referenceTempsC, samples: hourlySamples }),
    daily: assembleForecastTable({ kind: "daily", referenceTempsC, samples: dailySamples })
  };
}

export function renderForecastReport(report: ForecastReport, charset: Charset, opts: RenderOptions = {}): string {
  return [
    EXPLANATION,
    "",
    renderTable(formatForecastTable(report.hourly), charset, opts),
    "",
    renderTable(formatForecastTable(report.daily), charset, opts)
  ].join("\n");
}
