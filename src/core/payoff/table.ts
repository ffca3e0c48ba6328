import { roundTo } from "../utils/number";

export interface PayoffPoint {
  spot: number;
  pnl: number;
  profitable: boolean;
}

export type PayoffTable = PayoffPoint[];

export const classifyPayoff = (spot: number, pnl: number): PayoffPoint => ({
  spot,
  pnl,
  profitable: pnl >= 0,
});

export const computePayoffPoints = (profitAt: (spot: number) => number, spots: number[]): PayoffTable =>
  spots.map((s) => {
    const spot = roundTo(s);
    return classifyPayoff(spot, roundTo(profitAt(spot)));
  });
