/**
 * Error carrying the HTTP status and the `detail` string sent to the client
 */
export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'HttpError';
    this.status = status;
  }

  get detail(): string {
    return this.message;
  }
}

export class NotFoundError extends HttpError {
  constructor(detail = 'Not Found') {
    super(404, detail);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends HttpError {
  constructor(detail = 'Bad Request') {
    super(400, detail);
    this.name = 'BadRequestError';
  }
}

// Duplicate enrollment. Reported as 400 like every other invalid state change.
export class ConflictError extends HttpError {
  constructor(detail = 'Conflict') {
    super(400, detail);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends HttpError {
  constructor(detail = 'Unprocessable Entity') {
    super(422, detail);
    this.name = 'ValidationError';
  }
}
