export type ConfigErrorKind = "not_found" | "parse_error" | "unreadable" | "invalid";

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  readonly path?: string;

  constructor(kind: ConfigErrorKind, message: string, path?: string) {
    super(message);
    this.name = "ConfigError";
    this.kind = kind;
    this.path = path;
  }
}

export type FatalStage = "connection" | "output_directory";

/** A failure that ends the whole run before any view is extracted. */
export class FatalExtractionError extends Error {
  readonly stage: FatalStage;

  constructor(stage: FatalStage, message: string, cause: unknown) {
    super(message, { cause });
    this.name = "FatalExtractionError";
    this.stage = stage;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
