import { DateTime } from "luxon";
import { loadConfig } from "./config.js";
import { USAGE, UsageError, parseCliArgs } from "./cli.js";
import { getHourlyForecast } from "./adapters/weather/openMeteo.js";
import { buildReferenceTemperatures } from "./forecast/referenceTemperatures.js";
import { buildForecastReport, renderForecastReport } from "./report.js";
import { logger } from "./utils/logger.js";
import { nowCivil } from "./utils/time.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface RunContext {
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
  clock: () => DateTime;
}

const defaultContext: RunContext = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  clock: () => DateTime.now()
};

async function printReport(argv: readonly string[], ctx: RunContext): Promise<void> {
  const args = parseCliArgs(argv);
  if (args.help) {
    ctx.stdout.write(`${USAGE}\n`);
    return;
  }

  const cfg = loadConfig(ctx.env);
  const referenceTempsC = buildReferenceTemperatures({
    min_c: cfg.REF_TEMP_MIN_C,
    max_c: cfg.REF_TEMP_MAX_C,
    step_c: cfg.REF_TEMP_STEP_C
  });

  const forecast = await getHourlyForecast({
    lat: args.lat,
    lon: args.lng,
    timezone: cfg.FORECAST_TIMEZONE,
    forecastDays: cfg.FORECAST_DAYS,
    elevationM: cfg.ELEVATION_M,
    baseUrl: cfg.OPEN_METEO_URL,
    timeoutMs: cfg.HTTP_TIMEOUT_MS
  });

  const now = nowCivil(forecast.timezone, ctx.clock(), forecast.utc_offset_seconds);
  logger.debug({ timezone: forecast.timezone, now: now.toISO({ includeOffset: false }) }, "Building report");

  const report = buildForecastReport({
    samples: forecast.samples,
    now,
    referenceTempsC,
    hourlyRows: cfg.HOURLY_ROWS,
    dailyRows: cfg.DAILY_ROWS
  });
  const charset = args.ascii ? "ascii" : "unicode";
  ctx.stdout.write(`${renderForecastReport(report, charset, { styleHeader: ctx.stdout.isTTY === true })}\n`);
}

/** Runs the command line once and resolves to the process exit code. */
export async function main(argv: readonly string[], ctx: Partial<RunContext> = {}): Promise<number> {
  const context: RunContext = { ...defaultContext, ...ctx };
  try {
    await printReport(argv, context);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      context.stderr.write(`${err.message}\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    logger.fatal({ err }, "window-rh failed");
    return EXIT_FAILURE;
  }
}
