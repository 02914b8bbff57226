import type { DailyAverage, Sample } from "../types.js";
import { civilDateKey } from "../utils/time.js";

/**
 * One average per run of consecutive samples sharing a civil date, in input
 * order. Relies on sorted input: a date that reappears later starts a new run.
 * Every sample weighs the same regardless of its spacing within the day.
 */
export function aggregateByDay(samples: readonly Sample[]): DailyAverage[] {
  const out: DailyAverage[] = [];

  let key: string | null = null;
  let first: Sample | null = null;
  let tempSum = 0;
  let rhSum = 0;
  let count = 0;

  const flush = () => {
    if (!first || count === 0) return;
    out.push({
      date: first.time.startOf("day"),
      temp_c_mean: tempSum / count,
      rh_pct_mean: rhSum / count,
      count
    });
  };

  for (const sample of samples) {
    const sampleKey = civilDateKey(sample.time);
    if (sampleKey !== key) {
      flush();
      key = sampleKey;
      first = sample;
      tempSum = 0;
      rhSum = 0;
      count = 0;
    }
    tempSum += sample.temp_c;
    rhSum += sample.rh_pct;
    count += 1;
  }
  flush();

  return out;
}

export function dailyAverageToSample(day: DailyAverage): Sample {
  return { time: day.date, temp_c: day.temp_c_mean, rh_pct: day.rh_pct_mean };
}
