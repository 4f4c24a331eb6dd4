export class StatsFileError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : "unknown error";
    super(`Could not read stats file "${path}": ${reason}`, { cause });
    this.name = "StatsFileError";
    this.path = path;
  }
}

// Raised by a live source when a response no longer has the shape we expect
export class UpstreamShapeError extends Error {
  readonly key: string;

  constructor(key: string, url?: string) {
    super(`Missing '${key}' key in upstream response${url ? ` (${url})` : ""}`);
    this.name = "UpstreamShapeError";
    this.key = key;
  }
}

export class LiveSourceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "LiveSourceError";
  }
}

export class PlayerNotFoundError extends Error {
  readonly player: string;

  constructor(player: string) {
    super(`No player found for "${player}"`);
    this.name = "PlayerNotFoundError";
    this.player = player;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
