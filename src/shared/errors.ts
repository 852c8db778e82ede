export class InvalidIconSizeError extends Error {
  constructor(
    readonly size: number,
    reason = "must be a positive integer"
  ) {
    super(`Invalid icon size ${size}: ${reason}`);
    this.name = "InvalidIconSizeError";
  }
}

export class IconRenderError extends Error {
  constructor(
    readonly size: number,
    cause: unknown
  ) {
    super(`Failed to render ${size}x${size} icon: ${describeError(cause)}`, { cause });
    this.name = "IconRenderError";
  }
}

export class IconWriteError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to write ${filePath}: ${describeError(cause)}`, { cause });
    this.name = "IconWriteError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
