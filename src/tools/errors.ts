/**
 * Tool Error Handling
 *
 * Failures of file-backed tools carry the path they were working on and a
 * code, so handlers can report them without inspecting Node error objects.
 *
 * @module tools/errors
 */

export enum ToolErrorCode {
  INVALID_PATH = 'INVALID_PATH',
  READ_FAILED = 'READ_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
}

const VERBS: Record<ToolErrorCode, string> = {
  [ToolErrorCode.INVALID_PATH]: 'Invalid path',
  [ToolErrorCode.READ_FAILED]: 'Cannot read',
  [ToolErrorCode.WRITE_FAILED]: 'Cannot write',
};

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: ToolErrorCode,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ToolError';
  }

  toJSON(): { name: string; message: string; code: ToolErrorCode; path: string } {
    return { name: this.name, message: this.message, code: this.code, path: this.path };
  }
}

/** Run file work on `path`; a failure becomes a ToolError naming the path. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  code: ToolErrorCode,
  path: string
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof ToolError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolError(`${VERBS[code]} ${path}: ${reason}`, code, path, { cause: error });
  }
}
