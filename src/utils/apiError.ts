export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ApiError';
  }

  static badRequest(message = 'Bad request', details?: Record<string, unknown>) {
    return new ApiError(400, message, details);
  }

  static notFound(message = 'Not found') {
    return new ApiError(404, message);
  }

  static badGateway(message = 'Bad gateway', details?: Record<string, unknown>) {
    return new ApiError(502, message, details);
  }

  static serviceUnavailable(message = 'Service unavailable', details?: Record<string, unknown>) {
    return new ApiError(503, message, details);
  }
}
