import assert from "node:assert/strict";
import { test } from "node:test";
import type { Sample } from "./types.js";
import { buildReferenceTemperatures } from "./forecast/referenceTemperatures.js";
import { EXPLANATION, buildForecastReport, renderForecastReport } from "./report.js";
import { parseCivil } from "./utils/time.js";

function civil(iso: string) {
  const t = parseCivil(iso);
  if (!t) throw new Error(`bad test time ${iso}`);
  return t;
}

const start = civil("2026-10-18T00:00");
const samples: Sample[] = Array.from({ length: 72 }, (_, i) => ({
  time: start.plus({ hours: i }),
  temp_c: 10 + (i % 24) / 2,
  rh_pct: 60
}));
const referenceTempsC = buildReferenceTemperatures();

test("hourly table lists the next ten hours from the current hour", () => {
  const report = buildForecastReport({ samples, now: civil("2026-10-18T05:42"), referenceTempsC });

  assert.equal(report.hourly.rows.length, 10);
  assert.equal(report.hourly.rows[0].label, "Sun 05:00");
  assert.equal(report.hourly.rows[0].temp_c, 12.5);
  assert.equal(report.hourly.rows[9].label, "Sun 14:00");
  report.hourly.rows.forEach((row) => assert.equal(row.projected_rh_pct.length, 13));
});

test("daily table starts with today and averages each day", () => {
  const report = buildForecastReport({ samples, now: civil("2026-10-18T05:42"), referenceTempsC });

  assert.deepEqual(
    report.daily.rows.map((r) => [r.label, r.temp_c]),
    [
      ["Sunday, Oct 18", 15.75],
      ["Monday, Oct 19", 15.75],
      ["Tuesday, Oct 20", 15.75]
    ]
  );
});

test("past days are dropped from the daily table", () => {
  const report = buildForecastReport({ samples, now: civil("2026-10-19T03:00"), referenceTempsC, dailyRows: 7 });
  assert.deepEqual(
    report.daily.rows.map((r) => r.label),
    ["Monday, Oct 19", "Tuesday, Oct 20"]
  );
});

test("row counts follow the requested limits", () => {
  const report = buildForecastReport({
    samples,
    now: civil("2026-10-18T05:42"),
    referenceTempsC,
    hourlyRows: 0,
    dailyRows: 1
  });
  assert.equal(report.hourly.rows.length, 0);
  assert.equal(report.daily.rows.length, 1);
});

test("rendered report opens with the explanation and draws both tables", () => {
  const report = buildForecastReport({ samples, now: civil("2026-10-18T05:42"), referenceTempsC });

  const lines = renderForecastReport(report, "ascii").split("\n");
  assert.equal(lines[0], EXPLANATION);
  assert.equal(lines[1], "");
  assert.ok(lines[2].startsWith("+"));
  assert.ok(lines[3].startsWith("| Hourly "));
  // border, header, rule, 10 rows, border, then a blank line before the daily table
  assert.equal(lines[16], "");
  assert.ok(lines[18].startsWith("| Daily "));
  assert.equal(lines.length, 2 + 14 + 1 + 7);

  const unicode = renderForecastReport(report, "unicode").split("\n");
  assert.ok(unicode[2].startsWith("┌"));
});
