// Thrown for caller mistakes that leave the space untouched: freeing while
// nothing is allocated, or building a space from bad parameters.
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
