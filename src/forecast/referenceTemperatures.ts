export interface ReferenceRange {
  min_c: number;
  max_c: number;
  step_c: number;
}

export const DEFAULT_REFERENCE_RANGE: ReferenceRange = { min_c: 16, max_c: 22, step_c: 0.5 };

// Steps like 0.1 accumulate float error; snap each value back onto a fine grid.
function snap(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

/** Inclusive range of candidate indoor temperatures, lowest first. */
export function buildReferenceTemperatures(range: ReferenceRange = DEFAULT_REFERENCE_RANGE): number[] {
  const { min_c, max_c, step_c } = range;
  if (![min_c, max_c, step_c].every(Number.isFinite)) {
    throw new Error(`Reference range must be finite (min=${min_c}, max=${max_c}, step=${step_c})`);
  }
  if (step_c <= 0) throw new Error(`Reference step must be positive (got ${step_c})`);
  if (max_c < min_c) throw new Error(`Reference max ${max_c} is below min ${min_c}`);

  const steps = Math.floor(snap((max_c - min_c) / step_c));
  const temps: number[] = [];
  for (let i = 0; i <= steps; i += 1) {
    temps.push(snap(min_c + i * step_c));
  }
  return temps;
}

export function assertReferenceTemperatures(temps: readonly number[]): void {
  if (temps.length === 0) throw new Error("Reference temperatures must not be empty");
  for (let i = 1; i < temps.length; i += 1) {
    if (!(temps[i] > temps[i - 1])) {
      throw new Error(`Reference temperatures must be strictly increasing (index ${i}: ${temps[i]})`);
    }
  }
}
