import { z } from "zod";
import type { HourlyForecast, Sample } from "../../types.js";
import { fetchWithTimeout } from "../../utils/fetchWithTimeout.js";
import { logger } from "../../utils/logger.js";
import { parseCivil } from "../../utils/time.js";

export const OPEN_METEO_FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

const HOURLY_VARIABLES = ["temperature_2m", "relative_humidity_2m"] as const;

const HourlyResponseSchema = z.object({
  timezone: z.string(),
  utc_offset_seconds: z.number(),
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: z.array(z.number().nullable()),
    relative_humidity_2m: z.array(z.number().nullable())
  })
});

const ErrorBodySchema = z.object({ reason: z.string() });

export type OpenMeteoHourlyResponse = z.infer<typeof HourlyResponseSchema>;

export interface HourlyForecastParams {
  lat: number;
  lon: number;
  timezone: string;
  forecastDays: number;
  elevationM?: number;
  baseUrl?: string;
  timeoutMs: number;
}

export function buildForecastUrl(params: HourlyForecastParams): URL {
  const url = new URL(params.baseUrl ?? OPEN_METEO_FORECAST_URL);
  url.searchParams.set("latitude", String(params.lat));
  url.searchParams.set("longitude", String(params.lon));
  url.searchParams.set("hourly", HOURLY_VARIABLES.join(","));
  url.searchParams.set("temperature_unit", "celsius");
  url.searchParams.set("timezone", params.timezone);
  url.searchParams.set("forecast_days", String(params.forecastDays));
  if (params.elevationM !== undefined) {
    url.searchParams.set("elevation", String(params.elevationM));
  }
  return url;
}

/** Maps a validated forecast payload onto samples; times stay in the location's wall clock. */
export function parseHourlyForecast(json: unknown): HourlyForecast {
  const parsed = HourlyResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Open-Meteo response malformed: ${parsed.error.message}`);
  }
  const { timezone, utc_offset_seconds, hourly } = parsed.data;
  const { time, temperature_2m, relative_humidity_2m } = hourly;

  if (temperature_2m.length !== time.length || relative_humidity_2m.length !== time.length) {
    throw new Error(
      `Open-Meteo hourly arrays differ in length (time=${time.length}, ` +
        `temperature_2m=${temperature_2m.length}, relative_humidity_2m=${relative_humidity_2m.length})`
    );
  }

  const samples: Sample[] = time.map((iso, i) => {
    const parsedTime = parseCivil(iso);
    if (!parsedTime) throw new Error(`Open-Meteo hourly time[${i}] is not a date-time: ${JSON.stringify(iso)}`);
    const temp = temperature_2m[i];
    const rh = relative_humidity_2m[i];
    if (temp === null || rh === null) {
      throw new Error(`Open-Meteo hourly values missing at ${iso} (index ${i})`);
    }
    return { time: parsedTime, temp_c: temp, rh_pct: rh };
  });

  return { timezone, utc_offset_seconds, samples };
}

async function describeFailure(resp: Response): Promise<string> {
  const base = `Open-Meteo error: ${resp.status} ${resp.statusText}`;
  try {
    const body = ErrorBodySchema.safeParse(await resp.json());
    return body.success ? `${base} (${body.data.reason})` : base;
  } catch (e) {
    logger.debug({ err: e }, "Open-Meteo error body is not JSON");
    return base;
  }
}

export async function getHourlyForecast(params: HourlyForecastParams): Promise<HourlyForecast> {
  const url = buildForecastUrl(params);
  logger.debug({ url: url.toString() }, "Fetching Open-Meteo hourly forecast");

  const resp = await fetchWithTimeout(url, { timeoutMs: params.timeoutMs });
  if (!resp.ok) throw new Error(await describeFailure(resp));

  const forecast = parseHourlyForecast(await resp.json());
  logger.debug(
    { timezone: forecast.timezone, samples: forecast.samples.length },
    "Open-Meteo hourly forecast received"
  );
  return forecast;
}
