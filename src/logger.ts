export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
};

export type LogWriter = (line: string, level: LogLevel) => void;

function serializeCtx(ctx?: Record<string, unknown>): string {
  if (!ctx || Object.keys(ctx).length === 0) return "";
  return ` ${JSON.stringify(ctx)}`;
}

const defaultWriter: LogWriter = (line, level) => {
  const stream = level === "error" ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
};

export function makeLogger(level: LogLevel, write: LogWriter = defaultWriter): Logger {
  const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

  function log(method: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (rank[method] < rank[level]) return;
    write(`[${new Date().toISOString()}] ${method.toUpperCase()} ${msg}${serializeCtx(ctx)}`, method);
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}
