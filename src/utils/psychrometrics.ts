// Psychrometrics helpers for the open-the-window decision.
// - saturation vapor pressure of water (Pa)
// - actual vapor pressure (Pa)
// - relative humidity of the same air at other temperatures
//
// Saturation pressure uses the IAPWS-IF97 region 4 saturation equation.

const KELVIN_OFFSET = 273.15;

// IAPWS-IF97 region 4 coefficients n1..n10.
const N = [
  0.11670521452767e4, -0.72421316703206e6, -0.17073846940092e2, 0.12020824702470e5,
  -0.32325550322333e7, 0.14915108613530e2, -0.48232657361591e4, 0.40511340542057e6,
  -0.23855557567849, 0.65017534844798e3
] as const;

function cToK(c: number): number {
  return c + KELVIN_OFFSET;
}

export function saturationPressurePa(tempC: number): number {
  const T = cToK(tempC);
  const theta = T + N[8] / (T - N[9]);
  const A = theta * theta + N[0] * theta + N[1];
  const B = N[2] * theta * theta + N[3] * theta + N[4];
  const C = N[5] * theta * theta + N[6] * theta + N[7];

  const pMPa = Math.pow((2 * C) / (-B + Math.sqrt(B * B - 4 * A * C)), 4);
  const pPa = pMPa * 1e6;
  if (!Number.isFinite(pPa)) {
    throw new Error(`Saturation pressure is not finite for ${tempC}°C`);
  }
  return pPa;
}

export function vaporPressurePa(tempC: number, rhPct: number): number {
  return (rhPct / 100) * saturationPressurePa(tempC);
}

/**
 * Relative humidity (%) the observed air would have once warmed or cooled to
 * each reference temperature, with its vapor pressure unchanged.
 *
 * Values above 100 are returned as-is: they mean the air would condense indoors.
 */
export function projectRelativeHumidity(
  tempC: number,
  rhPct: number,
  referenceTempsC: readonly number[]
): number[] {
  const vapor = vaporPressurePa(tempC, rhPct);
  return referenceTempsC.map((refC) => 100 * (vapor / saturationPressurePa(refC)));
}
