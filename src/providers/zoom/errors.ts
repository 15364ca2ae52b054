export class ZoomError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid connector settings. Raised before any call is made. */
export class ConfigurationError extends ZoomError {}

/** The request never got an HTTP response (DNS, refused connection, timeout). */
export class TransportError extends ZoomError {}

/** Zoom answered with status 400 or above. */
export class ApiError extends ZoomError {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: number
  ) {
    super(message);
  }
}

// Zoom error codes, see https://developers.zoom.us/docs/api/rest/error-definitions/
const USER_NOT_EXIST_CODE = 1001;
const USER_ALREADY_EXISTS_CODE = 1005;

const USER_NOT_FOUND_PATTERNS = ['not exist', 'not found', 'not belong to this account'];

/**
 * Whether Zoom reported an unknown user. Prefers the error code; older
 * responses only carry the human-readable message, which is matched loosely.
 */
export function isUserNotFoundError(error: unknown): error is ApiError {
  if (!(error instanceof ApiError)) {
    return false;
  }
  if (error.code === USER_NOT_EXIST_CODE) {
    return true;
  }
  const message = error.message.toLowerCase();
  return USER_NOT_FOUND_PATTERNS.some((pattern) => message.includes(pattern));
}

export function isUserAlreadyExistsError(error: unknown): error is ApiError {
  if (!(error instanceof ApiError)) {
    return false;
  }
  return error.code === USER_ALREADY_EXISTS_CODE || error.message.includes('User already in the account');
}
