import { InvalidPriceError, InvalidStrikeOrderingError } from "../../errors";
import { summarizeLegs, type StrategySummary } from "../analytics/summary";
import { validateLegs, type OptionLeg } from "../payoff/legs";
import { buildSpotRange } from "../payoff/range";
import { computePayoffPoints, type PayoffTable } from "../payoff/table";
import { roundTo } from "../utils/number";

export const JADE_LIZARD_DEFAULT_HL = 0;
export const JADE_LIZARD_DEFAULT_HU = 1.9;

export interface JadeLizardPosition {
  /** XHU: upper strike of the bear call spread (the call you buy) */
  longCallStrike: number;
  /** XHL: lower strike of the bear call spread (the call you sell) */
  shortCallStrike: number;
  /** XM: strike of the OTM put you sell */
  shortPutStrike: number;
  /** lcp: premium paid for the long call */
  longCallPremium: number;
  /** scp: premium received for the short call */
  shortCallPremium: number;
  /** spp: premium received for the short put */
  shortPutPremium: number;
}

export interface JadeLizardArgs extends JadeLizardPosition {
  priceAtExpiry: number;
}

export interface JadeLizardTableArgs extends JadeLizardPosition {
  /** ST: reference spot price the range multipliers apply to */
  spot: number;
  hl?: number;
  hu?: number;
}

export interface JadeLizardSummary extends StrategySummary {
  /** True when the credit does not cover the call-spread width, so a rally loses money */
  upsideRisk: boolean;
}

export const jadeLizardLegs = (opts: JadeLizardPosition): OptionLeg[] => [
  { kind: "call", side: "long", strike: opts.longCallStrike, premium: opts.longCallPremium, label: "long call" },
  { kind: "call", side: "short", strike: opts.shortCallStrike, premium: opts.shortCallPremium, label: "short call" },
  { kind: "put", side: "short", strike: opts.shortPutStrike, premium: opts.shortPutPremium, label: "short put" },
];

export const validateJadeLizard = (opts: JadeLizardPosition): void => {
  validateLegs(jadeLizardLegs(opts));
  if (opts.shortCallStrike >= opts.longCallStrike)
    throw new InvalidStrikeOrderingError(
      `For a jade lizard, the short call strike (${opts.shortCallStrike}) must be LESS than the long call strike (${opts.longCallStrike}).`
    );
};

export const jadeLizardNetCredit = (opts: JadeLizardPosition): number =>
  opts.shortPutPremium + opts.shortCallPremium - opts.longCallPremium;

const profitAt = (opts: JadeLizardPosition, spot: number): number =>
  Math.max(spot - opts.longCallStrike, 0) -
  Math.max(spot - opts.shortCallStrike, 0) -
  Math.max(opts.shortPutStrike - spot, 0) +
  jadeLizardNetCredit(opts);

/** Per-unit PnL at expiration, rounded to cents. */
export const jadeLizardProfit = (opts: JadeLizardArgs): number => {
  if (!Number.isFinite(opts.priceAtExpiry)) throw new InvalidPriceError("priceAtExpiry must be a finite number.");
  validateJadeLizard(opts);
  return roundTo(profitAt(opts, opts.priceAtExpiry));
};

export const jadeLizardTable = (opts: JadeLizardTableArgs): PayoffTable => {
  const { spot, hl = JADE_LIZARD_DEFAULT_HL, hu = JADE_LIZARD_DEFAULT_HU } = opts;
  validateJadeLizard(opts);
  const spots = buildSpotRange({ spot, hl, hu });
  return computePayoffPoints((s) => profitAt(opts, s), spots);
};

export const jadeLizardSummary = (opts: JadeLizardPosition): JadeLizardSummary => {
  validateJadeLizard(opts);
  const width = opts.longCallStrike - opts.shortCallStrike;
  return {
    ...summarizeLegs(jadeLizardLegs(opts)),
    upsideRisk: jadeLizardNetCredit(opts) < width,
  };
};
