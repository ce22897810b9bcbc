export type DigestStage = "config" | "compose" | "format" | "publish";

/**
 * Fatal failure of one pipeline stage. Anything thrown as a DigestError ends the
 * run with a non-zero exit code.
 */
export class DigestError extends Error {
  stage: DigestStage;
  status?: number;

  constructor(stage: DigestStage, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DigestError";
    this.stage = stage;
    this.status = options.status;
  }
}

export class ConfigError extends DigestError {
  issues: string[];

  constructor(issues: string[]) {
    super("config", `Configuration is invalid:\n${issues.join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
