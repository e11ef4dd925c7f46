/**
 * Logging
 *
 * Components take an optional injected Logger and prefix their lines with
 * their own name (e.g. "[VoiceBridge]"). The entrypoint builds a console
 * logger filtered by level.
 */

/**
 * Logger interface for injected logging.
 */
export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

export type LogLevel = keyof Logger;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Render one log argument. Errors keep their stack, objects become JSON.
 */
function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "string") {
    return arg;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Create a stdout logger that drops lines below `level`.
 *
 * @param write Line sink (defaults to process.stdout)
 */
export function createConsoleLogger(
  level: LogLevel,
  write: (line: string) => void = (line) => process.stdout.write(line),
): Logger {
  function log(method: LogLevel, msg: string, args: unknown[]): void {
    if (LEVEL_RANK[method] < LEVEL_RANK[level]) return;
    const extra = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
    write(`[${new Date().toISOString()}] ${method.toUpperCase()} ${msg}${extra}\n`);
  }

  return {
    debug: (msg, ...args) => log("debug", msg, args),
    info: (msg, ...args) => log("info", msg, args),
    warn: (msg, ...args) => log("warn", msg, args),
    error: (msg, ...args) => log("error", msg, args),
  };
}
