/**
 * Logging helpers: message formatting, caller location and level ordering
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Whether a message at `level` passes the `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

/**
 * Format message for logging
 */
export function formatMessage(msg: unknown): string {
  if (typeof msg === "string") return msg;
  if (msg instanceof Error) return msg.stack ?? msg.message;
  if (typeof msg === "object" && msg !== null) {
    try {
      return JSON.stringify(msg);
    } catch {
      return String(msg);
    }
  }
  return String(msg);
}

/**
 * Extract file name and line number from caller stack.
 * @param skipFrames Number of additional stack frames to skip (default 0)
 */
export function getCallerFileLine(skipFrames = 0): string {
  const obj: { stack?: string } = {};
  Error.captureStackTrace(obj, getCallerFileLine);

  const stack = obj.stack;
  if (stack === undefined || stack.length === 0) return "unknown:0";

  const lines = stack.split("\n");
  const baseIndex = 3 + skipFrames;
  const callSite = lines[baseIndex] || lines[baseIndex + 1] || "";

  const reParen = /\(([^()]+):(\d+):\d+\)/;
  const reAt = /at ([^():]+):(\d+):\d+/;
  const match = reParen.exec(callSite) ?? reAt.exec(callSite);
  if (!match) return "unknown:0";

  const filePath = match[1];
  const lineNum = match[2];
  const fileName = filePath.split(/[\\/]/).pop() ?? "unknown";
  return `${fileName}:${lineNum}`;
}
