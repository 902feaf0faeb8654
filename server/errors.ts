export type FileServiceErrorCode =
  | "auth_failure"
  | "invalid_path"
  | "not_found"
  | "already_exists"
  | "invalid_input"
  | "forbidden"
  | "permission_denied"
  | "zip_failed"
  | "unpack_failed"
  | "upload_failed";

const statusByCode: Record<FileServiceErrorCode, number> = {
  auth_failure: 403,
  invalid_path: 400,
  not_found: 404,
  already_exists: 409,
  invalid_input: 400,
  forbidden: 403,
  permission_denied: 403,
  zip_failed: 500,
  unpack_failed: 500,
  upload_failed: 500
};

export class FileServiceError extends Error {
  readonly code: FileServiceErrorCode;
  readonly statusCode: number;

  constructor(code: FileServiceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FileServiceError";
    this.code = code;
    this.statusCode = statusByCode[code];
  }
}

export const ACCESS_DENIED_MESSAGE = "Access denied.";

export function accessDenied(): FileServiceError {
  return new FileServiceError("auth_failure", ACCESS_DENIED_MESSAGE);
}

export function isFileServiceError(error: unknown, code?: FileServiceErrorCode): error is FileServiceError {
  return error instanceof FileServiceError && (code === undefined || error.code === code);
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Maps OS-level failures onto the error taxonomy. Anything that is not a
 * recognised errno is rethrown untouched so the HTTP layer reports it as a 500.
 */
export function translateFsError(error: unknown, subject: string): never {
  if (error instanceof FileServiceError) {
    throw error;
  }

  switch (errnoCode(error)) {
    case "EACCES":
    case "EPERM":
      throw new FileServiceError("permission_denied", `Permission denied: ${subject}.`, { cause: error });
    case "ENOENT":
    case "ENOTDIR":
      throw new FileServiceError("not_found", `Not found: ${subject}.`, { cause: error });
    case "EEXIST":
      throw new FileServiceError("already_exists", `Already exists: ${subject}.`, { cause: error });
    default:
      throw error;
  }
}
