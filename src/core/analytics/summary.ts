import { legsProfit, netCredit, upperTailSlope, type OptionLeg } from "../payoff/legs";
import { normalize, roundTo } from "../utils/number";

export interface StrategySummary {
  /** Premiums received minus premiums paid (V0) */
  netCredit: number;
  /** Highest PnL at expiration, or null when the payoff keeps rising with spot */
  maxProfit: number | null;
  /** Lowest PnL at expiration (negative when the position can lose), or null when unbounded */
  maxLoss: number | null;
  /** Spot prices where PnL crosses zero, ascending */
  breakevens: number[];
}

// Spot 0 plus every strike: the payoff is linear between consecutive kinks.
const kinkPoints = (legs: readonly OptionLeg[]): number[] =>
  [...new Set([0, ...legs.map((l) => l.strike)])].sort((a, b) => a - b);

export const findBreakevens = (legs: readonly OptionLeg[]): number[] => {
  const xs = kinkPoints(legs);
  const ys = xs.map((x) => normalize(legsProfit(legs, x)));
  const roots: number[] = [];

  for (let i = 0; i < xs.length; i++) {
    const a = xs[i];
    const fa = ys[i];
    if (a === undefined || fa === undefined) continue;
    if (fa === 0) roots.push(a);
    const b = xs[i + 1];
    const fb = ys[i + 1];
    if (b === undefined || fb === undefined) continue;
    if (fa * fb < 0) roots.push(a + ((0 - fa) * (b - a)) / (fb - fa));
  }

  const lastX = xs[xs.length - 1];
  const lastY = ys[ys.length - 1];
  const slope = upperTailSlope(legs);
  if (lastX !== undefined && lastY !== undefined && slope !== 0 && lastY * slope < 0) {
    roots.push(lastX - lastY / slope);
  }

  return [...new Set(roots.map((r) => roundTo(r)))].sort((a, b) => a - b);
};

export const summarizeLegs = (legs: readonly OptionLeg[]): StrategySummary => {
  const values = kinkPoints(legs).map((x) => legsProfit(legs, x));
  const slope = upperTailSlope(legs);
  return {
    netCredit: roundTo(netCredit(legs)),
    maxProfit: slope > 0 ? null : roundTo(Math.max(...values)),
    maxLoss: slope < 0 ? null : roundTo(Math.min(...values)),
    breakevens: findBreakevens(legs),
  };
};
