import type { DateTimeUnit } from "luxon";
import type { CivilDateTime, Timestamped } from "../types.js";
import { truncateTo } from "../utils/time.js";

export interface WindowOptions {
  bucket: DateTimeUnit;
  step: number;
  count: number;
}

/**
 * Present-or-future slice of a chronological series: drops everything before
 * the start of `now`'s bucket, then keeps every `step`-th item up to `count`.
 *
 * `samples` must be sorted ascending by time. Only the leading run of past
 * samples is skipped; nothing after the first kept sample is re-checked.
 */
export function windowSeries<T extends Timestamped>(
  samples: readonly T[],
  opts: WindowOptions,
  now: CivilDateTime
): T[] {
  const { bucket, step, count } = opts;
  if (!Number.isInteger(step) || step < 1) {
    throw new RangeError(`window step must be an integer >= 1 (got ${step})`);
  }
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`window count must be an integer >= 0 (got ${count})`);
  }

  const start = truncateTo(now, bucket).toMillis();
  let first = 0;
  while (first < samples.length && samples[first].time.toMillis() < start) first += 1;

  const out: T[] = [];
  for (let i = first; i < samples.length && out.length < count; i += step) {
    out.push(samples[i]);
  }
  return out;
}
