// Raised by engine calculations when an input is out of range.
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

// Reject NaN/Infinity and, unless allowed, negative values.
export const assertFiniteNonNegative = (field: string, value: number) => {
  if (!Number.isFinite(value)) {
    throw new ValidationError(field, `${field} must be a finite number`);
  }
  if (value < 0) {
    throw new ValidationError(field, `${field} must not be negative`);
  }
};

export const assertPositive = (field: string, value: number) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `${field} must be greater than 0`);
  }
};
