export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Malformed or out-of-range input, scoped to the payload field that carried it. */
export class ValidationError extends AppError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, 400);
    this.field = field;
  }
}

/** A uniqueness rule would be broken: repeated favorite, cart entry or subscription. */
export class DuplicateError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class PermissionError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = "Authentication required.") {
    super(message, 401);
  }
}
