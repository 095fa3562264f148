import { z } from "zod";
import { InvalidParameterError, NonBindingFloorError } from "./errors";
import { equilibriumWage } from "./market";
import type { LaborMarketInput, LaborMarketParams } from "./types";

function coefficient(name: string) {
  return z.number({ required_error: `${name} is required`, invalid_type_error: `${name} must be a number` })
    .finite(`${name} must be finite`);
}

// Key order is the order invariants are checked in: the first issue zod
// reports is the one surfaced to the caller.
const parameterSchema = z.object({
  bS: coefficient("bS").gt(0, "bS must be > 0"),
  bD: coefficient("bD").gt(0, "bD must be > 0"),
  k: coefficient("k").min(0, "k must be >= 0"),
  t: coefficient("t").min(0, "t must be in [0, 1]").max(1, "t must be in [0, 1]").default(0),
  aS: coefficient("aS"),
  aD0: coefficient("aD0"),
  wBar: coefficient("wBar")
});

/**
 * Validates the raw coefficients and returns a frozen parameter record.
 *
 * Range checks run first (bS, bD, k, t); the floor is only compared against
 * w* once the slopes are known to be positive.
 *
 * @throws InvalidParameterError on the first failed range check
 * @throws NonBindingFloorError when wBar <= w*
 */
export function createLaborMarketParams(input: LaborMarketInput): Readonly<LaborMarketParams> {
  const parsed = parameterSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidParameterError(String(issue.path[0] ?? "params"), issue.message);
  }

  const v = parsed.data;
  const params: LaborMarketParams = {
    aS: v.aS,
    bS: v.bS,
    aD0: v.aD0,
    bD: v.bD,
    k: v.k,
    wBar: v.wBar,
    t: v.t
  };

  const wStar = equilibriumWage(params);
  if (params.wBar <= wStar) {
    throw new NonBindingFloorError(params.wBar, wStar);
  }

  return Object.freeze(params);
}
