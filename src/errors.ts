/**
 * Error taxonomy shared by every tool.
 *
 * Run-level errors (SchemaError, NotFoundError, ParseError, ConfigError) stop a
 * tool before any row is processed. Row-level errors (CreateError,
 * IdentityResolutionError) are turned into failure records by the batch runner.
 */

export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SchemaError extends MigrationError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[], source = "CSV") {
    super(`${source} is missing required columns: ${missingColumns.join(", ")}`);
    this.missingColumns = missingColumns;
  }
}

export class NotFoundError extends MigrationError {
  readonly path: string;

  constructor(path: string, what = "File") {
    super(`${what} not found: ${path}`);
    this.path = path;
  }
}

export class ParseError extends MigrationError {}

export class NoRecordsError extends ParseError {
  constructor(triedPaths: string[]) {
    super(`No user records found (tried: ${triedPaths.join(", ")})`);
  }
}

export class ConfigError extends MigrationError {}

export class CreateError extends MigrationError {
  readonly status?: number;
  readonly body: string;

  constructor(username: string, status: number | undefined, body: string) {
    super(
      status != null
        ? `Failed to create user ${username}. Status code: ${status}, Response: ${body}`
        : `Exception creating user ${username}: ${body}`
    );
    this.status = status;
    this.body = body;
  }
}

export class IdentityResolutionError extends MigrationError {
  readonly username: string;

  constructor(username: string) {
    super(`Could not retrieve user ID for ${username}`);
    this.username = username;
  }
}

export class InsufficientWordsError extends MigrationError {
  constructor(available: number, required: number) {
    super(`Word list has ${available} distinct word(s); at least ${required} required`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
