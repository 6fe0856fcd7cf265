import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { hasErrnoCode } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling redaction despite configured keys. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are always redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set(["authorization", "api_key", "api-key", "token", "secret", "password"]);

/**
 * Parses the `VALUE_GRAPH_LOG_REDACT` directive. The helper accepts
 * comma-separated values such as `"on,credentials"` or `"off"`: toggles switch
 * redaction on or off while any other entry names an extra payload key to
 * scrub. Redaction defaults to enabled when extra keys are listed without an
 * explicit toggle.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  keys: Array<string>;
} {
  if (!raw) {
    return { enabled: false, keys: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const keys: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    keys.push(normalised);
  }

  if (enabled === undefined) {
    enabled = keys.length > 0;
  }

  return { enabled, keys: Array.from(new Set(keys)) };
}

/** Default maximum size (in bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Explicit toggle for payload redaction. When omitted the logger falls back
   * to {@link parseRedactionDirectives} on `VALUE_GRAPH_LOG_REDACT`.
   */
  readonly redactionEnabled?: boolean;
  /** Extra payload keys redacted on top of the built-in sensitive keys. */
  readonly redactKeys?: Array<string>;
  /** Suppresses the stdout stream; entries still reach the file and listener. */
  readonly silent?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactionEnabled: boolean;
  private readonly redactKeys: Set<string>;
  private readonly silent: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Tracks whether the directory containing {@link logFile} exists already. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.minLevel = options.level ?? "info";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.VALUE_GRAPH_LOG_REDACT);
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.redactKeys = new Set([
      ...SENSITIVE_KEYS,
      ...directives.keys,
      ...(options.redactKeys ?? []).map((key) => key.toLowerCase()),
    ]);
    this.silent = options.silent ?? false;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /**
   * Waits for all pending file writes. Tests rely on this helper to assert the
   * content of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const safePayload = payload !== undefined && this.redactionEnabled ? this.deepRedact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending the pending bytes would exceed
   * the configured size. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.redactKeys.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!hasErrnoCode(error, "ENOENT")) {
      throw error;
    }
  }
}

/** Minimal logging surface accepted by the adapters and the codec. */
export type GraphLogger = Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
