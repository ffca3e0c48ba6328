import { InvalidRangeError } from "../../errors";
import { normalize, range } from "../utils/number";

export interface SpotRangeArgs {
  /** Reference spot price the multipliers apply to */
  spot: number;
  /** Lower multiplier, e.g. 0.4 starts the range at 40% of spot */
  hl: number;
  /** Upper multiplier; must exceed hl */
  hu: number;
}

export const validateSpotRange = ({ spot, hl, hu }: SpotRangeArgs): void => {
  if (![spot, hl, hu].every(Number.isFinite))
    throw new InvalidRangeError("spot, hl and hu must be finite numbers.");
  if (spot <= 0) throw new InvalidRangeError(`spot must be positive (got ${spot}).`);
  if (hl < 0) throw new InvalidRangeError(`hl cannot be negative (got ${hl}).`);
  if (hu <= hl) throw new InvalidRangeError(`hu (${hu}) must be greater than hl (${hl}).`);
};

/**
 * Unit-step spot prices from floor(spot * hl) to floor(spot * hu), inclusive.
 */
export const buildSpotRange = (args: SpotRangeArgs): number[] => {
  validateSpotRange(args);
  const start = Math.floor(normalize(args.spot * args.hl));
  const end = Math.floor(normalize(args.spot * args.hu));
  return range(start, end, 1);
};
