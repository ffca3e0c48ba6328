/** Base class for every input rejected before a payoff table is built. */
export class PayoffInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Spot price or range multipliers cannot produce an ascending spot range. */
export class InvalidRangeError extends PayoffInputError {}

/** A spread's strikes are in the wrong order (e.g. short call above long call). */
export class InvalidStrikeOrderingError extends PayoffInputError {}

/** Price at expiration is not a finite number. */
export class InvalidPriceError extends PayoffInputError {}

export class InvalidStrikeError extends PayoffInputError {}

export class InvalidPremiumError extends PayoffInputError {}
