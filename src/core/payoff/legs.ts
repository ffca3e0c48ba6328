import { InvalidPremiumError, InvalidStrikeError } from "../../errors";
import { intrinsic } from "../utils/number";

export type OptionKind = "call" | "put";
export type LegSide = "long" | "short";

export interface OptionLeg {
  kind: OptionKind;
  side: LegSide;
  strike: number;
  /** Premium per unit of the underlying, paid when long and received when short */
  premium: number;
  /** Used in error messages, e.g. "short put" */
  label?: string;
}

const legName = (leg: OptionLeg): string => leg.label ?? `${leg.side} ${leg.kind}`;

const direction = (side: LegSide): number => (side === "long" ? 1 : -1);

export const validateLegs = (legs: readonly OptionLeg[]): void => {
  for (const leg of legs) {
    if (!Number.isFinite(leg.strike))
      throw new InvalidStrikeError(`${legName(leg)} strike must be a finite number.`);
    if (leg.strike < 0) throw new InvalidStrikeError(`${legName(leg)} strike cannot be negative.`);
    if (!Number.isFinite(leg.premium))
      throw new InvalidPremiumError(`${legName(leg)} premium must be a finite number.`);
    if (leg.premium < 0) throw new InvalidPremiumError(`${legName(leg)} premium cannot be negative.`);
  }
};

/** Premiums received minus premiums paid when the position is opened (V0). */
export const netCredit = (legs: readonly OptionLeg[]): number =>
  legs.reduce((acc, leg) => acc - direction(leg.side) * leg.premium, 0);

/** Intrinsic value of all legs at expiration, before premiums. */
export const legsIntrinsic = (legs: readonly OptionLeg[], spot: number): number =>
  legs.reduce((acc, leg) => acc + direction(leg.side) * intrinsic(leg.kind, leg.strike, spot), 0);

/** Unrounded per-unit PnL at expiration for a spot price. */
export const legsProfit = (legs: readonly OptionLeg[], spot: number): number =>
  legsIntrinsic(legs, spot) + netCredit(legs);

/** Slope of the payoff beyond the highest strike: +1 per long call, -1 per short call. */
export const upperTailSlope = (legs: readonly OptionLeg[]): number =>
  legs.reduce((acc, leg) => (leg.kind === "call" ? acc + direction(leg.side) : acc), 0);
