/**
 * Error types for content-cloud API responses.
 * The API returns errors in shape: { type: "error", status, code, message, request_id }
 */

export class ContentApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
    public readonly requestId?: string,
  ) {
    super(message);
    this.name = "ContentApiError";
  }
}

/** Thrown on 401: the token is missing, expired or was never issued. */
export class ContentAuthError extends ContentApiError {
  constructor(message: string, requestId?: string) {
    super(message, 401, "unauthorized", requestId);
    this.name = "ContentAuthError";
  }
}

/** Thrown when the requested item does not exist. */
export class ContentNotFoundError extends ContentApiError {
  constructor(
    public readonly resource: string,
    public readonly resourceId: string,
    requestId?: string,
  ) {
    super(`No such ${resource}: '${resourceId}'`, 404, "not_found", requestId);
    this.name = "ContentNotFoundError";
  }
}

/** Thrown when a sibling with the same name already exists. */
export class ContentConflictError extends ContentApiError {
  constructor(message: string, requestId?: string) {
    super(message, 409, "item_name_in_use", requestId);
    this.name = "ContentConflictError";
  }
}
