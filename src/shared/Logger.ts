export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

/** 由 LITDB_LOG_LEVEL 決定預設門檻，未設定或無效時為 info */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.LITDB_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Error 物件 JSON.stringify 後會是 {}，先攤平成可讀欄位 */
function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && typeof value.code === 'string') out.code = value.code;
    if (value.cause !== undefined) out.cause = serialize(value.cause);
    return out;
  }
  return value;
}

/** 結構化 JSON logger，一律寫到 stderr，stdout 留給指令輸出 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = defaultLogLevel(),
  ) {}

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.minLevel]) return;
    const fields: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(data ?? {})) {
      fields[key] = serialize(val);
    }
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...fields,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
