export class DietError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Quantity expression could not be turned into grams
export class UnrecognizedUnitError extends DietError {
  constructor(
    readonly expression: string,
    readonly unit: string | null
  ) {
    super(
      unit
        ? `Unrecognized unit "${unit}" in "${expression}"`
        : `Unrecognized quantity "${expression}"`
    );
  }
}

export class InvalidProfileError extends DietError {
  constructor(readonly issues: string[]) {
    super(`Invalid profile: ${issues.join("; ")}`);
  }
}

export class UnknownFoodError extends DietError {
  constructor(readonly food: string) {
    super(`Unknown food "${food}"`);
  }
}
