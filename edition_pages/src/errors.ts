import type { UploadedPage } from './types.js';

export class EditionPagesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PageNameError extends EditionPagesError {
  constructor(readonly fileName: string) {
    super(`${fileName} is an invalid filename`);
  }
}

/** No edition directory exists for the requested date. */
export class NoEditionError extends EditionPagesError {}

export type UploadErrorCode = 'CONNECTION_ERROR' | 'AUTH_ERROR' | 'DIRECTORY_ERROR' | 'TRANSFER_ERROR';

export class UploadError extends EditionPagesError {
  /** Pages that reached the server before the failure. */
  readonly uploaded: UploadedPage[];

  constructor(
    message: string,
    readonly code: UploadErrorCode,
    options: { cause?: unknown; uploaded?: UploadedPage[] } = {},
  ) {
    super(message, { cause: options.cause });
    this.uploaded = options.uploaded ?? [];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
