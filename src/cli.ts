import { z } from "zod";

export const USAGE = "Usage: window-rh <lat> <lng> [--ascii]";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const CoordinatesSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lng: z.coerce.number().min(-180).max(180)
});

export type CliArgs =
  | { help: true }
  | { help: false; lat: number; lng: number; ascii: boolean };

// Numbers (including negative ones like -33.9) are positionals, not flags.
const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)$/;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  let ascii = false;

  for (const a of argv) {
    if (a === "--help" || a === "-h") return { help: true };
    if (a === "--ascii") {
      ascii = true;
      continue;
    }
    if (a.startsWith("-") && !NUMERIC.test(a)) throw new UsageError(`Unknown option: ${a}`);
    positionals.push(a);
  }

  if (positionals.length !== 2) {
    throw new UsageError(`Expected <lat> <lng>, got ${positionals.length} argument(s)`);
  }
  const [lat, lng] = positionals;
  if (!NUMERIC.test(lat) || !NUMERIC.test(lng)) {
    throw new UsageError(`Coordinates must be numbers (got ${lat} ${lng})`);
  }

  const parsed = CoordinatesSchema.safeParse({ lat, lng });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid ${issue.path.join(".")}: ${issue.message}`);
  }
  return { help: false, ascii, ...parsed.data };
}
