export type LaborMarketErrorKind = "InvalidParameter" | "NonBindingFloor";

export class LaborMarketError extends Error {
  readonly kind: LaborMarketErrorKind;

  constructor(kind: LaborMarketErrorKind, message: string) {
    super(message);
    this.name = "LaborMarketError";
    this.kind = kind;
  }
}

export class InvalidParameterError extends LaborMarketError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("InvalidParameter", message);
    this.name = "InvalidParameterError";
    this.field = field;
  }
}

/**
 * The floor sits at or below the market-clearing wage, so it never binds and
 * the model has nothing to say about it.
 */
export class NonBindingFloorError extends LaborMarketError {
  readonly wBar: number;
  readonly equilibriumWage: number;

  constructor(wBar: number, equilibriumWage: number) {
    super(
      "NonBindingFloor",
      `Wage floor wBar=${wBar} must be > equilibrium wage w*=${equilibriumWage.toFixed(4)} to be binding`
    );
    this.name = "NonBindingFloorError";
    this.wBar = wBar;
    this.equilibriumWage = equilibriumWage;
  }
}
