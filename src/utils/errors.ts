export class VectorError extends Error {
    public details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>) {
      super(message);
      this.details = details;
      this.name = 'VectorError';
    }
  }

  export class ComponentIndexError extends VectorError {
    constructor(index: number, dimension: number) {
      super(`Component index ${index} is out of range for a ${dimension}D vector`, { index, dimension });
      this.name = 'ComponentIndexError';
    }
  }

  export class DimensionMismatchError extends VectorError {
    constructor(expected: number, actual: number) {
      super(`Vector dimension mismatch. Expected ${expected}, got ${actual}`, { expected, actual });
      this.name = 'DimensionMismatchError';
    }
  }

  export class DegenerateVectorError extends VectorError {
    constructor(operation: string) {
      super(`Cannot ${operation} a zero-length vector`, { operation });
      this.name = 'DegenerateVectorError';
    }
  }

  export class RandomRangeError extends VectorError {
    constructor(min: number, max: number) {
      super(`Invalid random range [${min}, ${max})`, { min, max });
      this.name = 'RandomRangeError';
    }
  }
