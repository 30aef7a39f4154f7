// packages/utils/errors.ts

/** Bad caller input, rejected before any collaborator is called. Maps to HTTP 400. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
