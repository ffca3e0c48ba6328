export const range = (start: number, end: number, step: number): number[] => {
  if (![start, end, step].every(Number.isFinite)) throw new Error("range args must be finite numbers.");
  if (step === 0) throw new Error("range step cannot be 0.");
  const out: number[] = [];
  const dir = Math.sign(step);
  for (let x = start; dir > 0 ? x <= end : x >= end; x += step) {
    out.push(Number(x.toFixed(10)));
  }
  return out;
};

// toFixed rounds on the exact binary value, so only true ties reach the even-digit step.
const isExactTie = (magnitude: number, digits: number): boolean => {
  const expanded = magnitude.toFixed(100);
  return /^50*$/.test(expanded.slice(expanded.indexOf(".") + 1 + digits));
};

/** Rounds to the nearest multiple of 10^-digits; exact ties go to the even digit. "+ 0" folds -0 into 0. */
export const roundTo = (value: number, digits = 2): number => {
  const magnitude = Math.abs(value);
  if (!Number.isFinite(value) || magnitude >= 1e21) return value;
  const factor = 10 ** digits;
  let units = Math.round(Number(magnitude.toFixed(digits)) * factor);
  if (units % 2 === 1 && isExactTie(magnitude, digits)) units -= 1;
  return (Math.sign(value) * units) / factor + 0;
};

/** Strips float noise such as 18.999999999999996 before the value is floored. */
export const normalize = (value: number): number => Number(value.toFixed(10));

export const intrinsic = (kind: "call" | "put", strike: number, spot: number): number =>
  kind === "call" ? Math.max(spot - strike, 0) : Math.max(strike - spot, 0);
