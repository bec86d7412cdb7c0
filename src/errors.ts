export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class InvalidUrlError extends AppError {
  constructor(url: string) {
    super(`Invalid YouTube URL: ${url}`, 400);
  }
}

export class NotPlaylistError extends AppError {
  constructor() {
    super("Provided URL is not a playlist URL", 400);
  }
}

export class PlaylistUnavailableError extends AppError {
  constructor(url: string) {
    super(`Failed to get playlist info: ${url}`, 400);
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(choice: string, available: string[]) {
    super(`Unsupported output format: ${choice}. Choose one of: ${available.join(", ")}`, 400);
  }
}

export class AiUnavailableError extends AppError {
  constructor() {
    super("AI service is not available. Please check API key configuration.", 503);
  }
}

export class CommandError extends Error {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Command failed (${command}): code=${exitCode}\nSTDERR: ${stderr}`);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
