import type { PayoffTable } from "../../core";
import { formatUSD } from "./format";

export interface BuiltPayoffTable {
  headers: string[];
  rows: string[][]; // already formatted strings ready to join with "\t"
}

export const buildPayoffTable = (table: PayoffTable): BuiltPayoffTable => ({
  headers: ["Spot", "PnL", "Outcome"],
  rows: table.map((point) => [String(point.spot), formatUSD(point.pnl), point.profitable ? "profit" : "loss"]),
});
