export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

export type Log = {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isLevel = (s: string): s is LogLevel => Object.hasOwn(RANK, s);

function threshold(): number {
  const lv = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(lv) ? RANK[lv] : RANK.info;
}

function redact(line: string): string {
  const needles = String(process.env.LOG_REDACT_LIST || '')
    .split(',').map(s => s.trim()).filter(Boolean);
  let out = line;
  for (const n of needles) out = out.split(n).join('[REDACTED]');
  return out;
}

function sink(level: LogLevel): (line: string) => void {
  switch (level) {
    case 'debug': return (l) => console.debug(l);
    case 'info': return (l) => console.log(l);
    case 'warn': return (l) => console.warn(l);
    case 'error': return (l) => console.error(l);
  }
}

/** Tagged logger; `JSON_LOGS=true` switches to one JSON object per line. */
export function createLog(tag: string): Log {
  const write = (level: LogLevel, msg: string, fields?: LogFields) => {
    if (RANK[level] < threshold()) return;
    let line: string;
    if (process.env.JSON_LOGS === 'true') {
      line = JSON.stringify({ ts: new Date().toISOString(), level, tag, msg, ...fields });
    } else {
      const extra = fields && Object.keys(fields).length ? ' ' + JSON.stringify(fields) : '';
      line = `[${tag}] ${msg}${extra}`;
    }
    sink(level)(redact(line));
  };
  return {
    debug: (m, f) => write('debug', m, f),
    info: (m, f) => write('info', m, f),
    warn: (m, f) => write('warn', m, f),
    error: (m, f) => write('error', m, f),
  };
}
