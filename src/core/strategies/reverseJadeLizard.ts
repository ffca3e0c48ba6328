import { InvalidPriceError, InvalidStrikeOrderingError } from "../../errors";
import { summarizeLegs, type StrategySummary } from "../analytics/summary";
import { validateLegs, type OptionLeg } from "../payoff/legs";
import { buildSpotRange } from "../payoff/range";
import { computePayoffPoints, type PayoffTable } from "../payoff/table";
import { roundTo } from "../utils/number";

export const REVERSE_JADE_LIZARD_DEFAULT_HL = 0.4;
export const REVERSE_JADE_LIZARD_DEFAULT_HU = 2.5;

// Also traded as the "twisted sister": a bull put spread plus a short OTM call.
export interface ReverseJadeLizardPosition {
  /** XLL: lower strike of the bull put spread (the put you buy) */
  longPutStrike: number;
  /** XLU: upper strike of the bull put spread (the put you sell) */
  shortPutStrike: number;
  /** XH: strike of the OTM call you sell */
  shortCallStrike: number;
  longPutPremium: number;
  shortPutPremium: number;
  shortCallPremium: number;
}

export interface ReverseJadeLizardArgs extends ReverseJadeLizardPosition {
  priceAtExpiry: number;
}

export interface ReverseJadeLizardTableArgs extends ReverseJadeLizardPosition {
  spot: number;
  hl?: number;
  hu?: number;
}

export interface ReverseJadeLizardSummary extends StrategySummary {
  /** True when the credit does not cover the put-spread width, so a sell-off loses money */
  downsideRisk: boolean;
}

export const reverseJadeLizardLegs = (opts: ReverseJadeLizardPosition): OptionLeg[] => [
  { kind: "put", side: "long", strike: opts.longPutStrike, premium: opts.longPutPremium, label: "long put" },
  { kind: "put", side: "short", strike: opts.shortPutStrike, premium: opts.shortPutPremium, label: "short put" },
  { kind: "call", side: "short", strike: opts.shortCallStrike, premium: opts.shortCallPremium, label: "short call" },
];

export const validateReverseJadeLizard = (opts: ReverseJadeLizardPosition): void => {
  validateLegs(reverseJadeLizardLegs(opts));
  if (opts.longPutStrike >= opts.shortPutStrike)
    throw new InvalidStrikeOrderingError(
      `For a reverse jade lizard, the long put strike (${opts.longPutStrike}) must be LESS than the short put strike (${opts.shortPutStrike}).`
    );
};

export const reverseJadeLizardNetCredit = (opts: ReverseJadeLizardPosition): number =>
  opts.shortPutPremium + opts.shortCallPremium - opts.longPutPremium;

const profitAt = (opts: ReverseJadeLizardPosition, spot: number): number =>
  Math.max(opts.longPutStrike - spot, 0) -
  Math.max(opts.shortPutStrike - spot, 0) -
  Math.max(spot - opts.shortCallStrike, 0) +
  reverseJadeLizardNetCredit(opts);

export const reverseJadeLizardProfit = (opts: ReverseJadeLizardArgs): number => {
  if (!Number.isFinite(opts.priceAtExpiry)) throw new InvalidPriceError("priceAtExpiry must be a finite number.");
  validateReverseJadeLizard(opts);
  return roundTo(profitAt(opts, opts.priceAtExpiry));
};

export const reverseJadeLizardTable = (opts: ReverseJadeLizardTableArgs): PayoffTable => {
  const { spot, hl = REVERSE_JADE_LIZARD_DEFAULT_HL, hu = REVERSE_JADE_LIZARD_DEFAULT_HU } = opts;
  validateReverseJadeLizard(opts);
  const spots = buildSpotRange({ spot, hl, hu });
  return computePayoffPoints((s) => profitAt(opts, s), spots);
};

export const reverseJadeLizardSummary = (opts: ReverseJadeLizardPosition): ReverseJadeLizardSummary => {
  validateReverseJadeLizard(opts);
  const width = opts.shortPutStrike - opts.longPutStrike;
  return {
    ...summarizeLegs(reverseJadeLizardLegs(opts)),
    downsideRisk: reverseJadeLizardNetCredit(opts) < width,
  };
};
