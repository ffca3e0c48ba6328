export const formatUSD = (n: number): string => {
  const s = n < 0 ? "-$" : "$";
  return s + Math.abs(n).toLocaleString("en-US", { maximumFractionDigits: 2 });
};

export const formatBound = (n: number | null): string => (n === null ? "unbounded" : formatUSD(n));
