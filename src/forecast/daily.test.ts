import assert from "node:assert/strict";
import { test } from "node:test";
import type { Sample } from "../types.js";
import { parseCivil } from "../utils/time.js";
import { aggregateByDay, dailyAverageToSample } from "./daily.js";

function civil(iso: string) {
  const t = parseCivil(iso);
  if (!t) throw new Error(`bad test time ${iso}`);
  return t;
}

function sample(iso: string, temp_c: number, rh_pct: number): Sample {
  return { time: civil(iso), temp_c, rh_pct };
}

test("48 hourly samples over two dates give two 24-sample averages", () => {
  const start = civil("2026-10-18T00:00");
  const series: Sample[] = Array.from({ length: 48 }, (_, i) => ({
    time: start.plus({ hours: i }),
    temp_c: i,
    rh_pct: 30 + i
  }));

  const days = aggregateByDay(series);

  assert.equal(days.length, 2);
  assert.deepEqual(
    days.map((d) => [d.date.toFormat("yyyy-LL-dd HH:mm"), d.count, d.temp_c_mean, d.rh_pct_mean]),
    [
      ["2026-10-18 00:00", 24, 11.5, 41.5],
      ["2026-10-19 00:00", 24, 35.5, 65.5]
    ]
  );
});

test("morning and evening samples average to the midpoint", () => {
  const [day] = aggregateByDay([sample("2026-10-18T08:00", 22, 50), sample("2026-10-18T20:00", 18, 70)]);
  assert.equal(day.count, 2);
  assert.equal(day.temp_c_mean, 20);
  assert.equal(day.rh_pct_mean, 60);
});

test("a single-sample day averages to that sample", () => {
  const days = aggregateByDay([
    sample("2026-10-18T22:00", 14, 71),
    sample("2026-10-18T23:00", 13, 75),
    sample("2026-10-19T00:00", 12.5, 80)
  ]);
  assert.equal(days.length, 2);
  assert.equal(days[1].count, 1);
  assert.equal(days[1].temp_c_mean, 12.5);
  assert.equal(days[1].rh_pct_mean, 80);
});

test("empty input has no days", () => {
  assert.deepEqual(aggregateByDay([]), []);
});

test("grouping is by consecutive run, not by date", () => {
  const days = aggregateByDay([
    sample("2026-10-18T10:00", 10, 50),
    sample("2026-10-19T10:00", 20, 50),
    sample("2026-10-18T11:00", 30, 50)
  ]);
  assert.deepEqual(
    days.map((d) => [d.date.toFormat("LL-dd"), d.temp_c_mean]),
    [
      ["10-18", 10],
      ["10-19", 20],
      ["10-18", 30]
    ]
  );
});

test("a daily average converts back to a sample at the start of its day", () => {
  const [day] = aggregateByDay([sample("2026-10-18T08:00", 22, 50), sample("2026-10-18T20:00", 18, 70)]);
  const s = dailyAverageToSample(day);
  assert.equal(s.time.toFormat("yyyy-LL-dd HH:mm"), "2026-10-18 00:00");
  assert.equal(s.temp_c, 20);
  assert.equal(s.rh_pct, 60);
});
