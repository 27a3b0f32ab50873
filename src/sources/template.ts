import fs from 'node:fs/promises';
import path from 'node:path';
import { DateTime } from 'luxon';
import { InvalidInputError } from '../errors.js';
import { createLog } from '../observability/log.js';

const log = createLog('query');

export type QueryParam = readonly string[] | DateTime | string;
export type QueryParams = Record<string, QueryParam>;

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const quote = (s: string) => `'${s.replace(/'/g, "''")}'`;

function literal(name: string, p: QueryParam): string {
  if (p instanceof DateTime) {
    if (!p.isValid) throw new InvalidInputError(`parameter :${name} is an invalid timestamp`, { reason: p.invalidReason });
    return quote(p.toFormat(TIMESTAMP_FORMAT));
  }
  if (typeof p === 'string') return quote(p);
  if (p.length === 0) throw new InvalidInputError(`parameter :${name} is an empty list`);
  return p.map(quote).join(',');
}

/**
 * Substitutes `:name` placeholders. Lists expand to a quoted, comma-separated
 * IN-list body, timestamps to `'YYYY-MM-DD HH24:MI:SS'`, strings to a quoted
 * literal. A placeholder without a parameter is rejected.
 */
export function renderQuery(template: string, params: QueryParams): string {
  return template.replace(/(?<![:\w]):([A-Za-z_][A-Za-z0-9_]*)/g, (_m, name: string) => {
    const p = params[name];
    if (p === undefined) throw new InvalidInputError(`no value for placeholder :${name}`);
    return literal(name, p);
  });
}

/** Loads `<baseDir>/<source>/<name>.sql`, caching text per loader. */
export class QueryLoader {
  private readonly cache = new Map<string, string>();
  constructor(private readonly baseDir: string) {}

  async load(source: string, name: string): Promise<string> {
    const key = `${source}/${name}`;
    const hit = this.cache.get(key);
    if (hit !== undefined) return hit;
    const file = path.join(this.baseDir, source, `${name}.sql`);
    const text = await fs.readFile(file, 'utf8');
    this.cache.set(key, text);
    log.debug('template loaded', { file });
    return text;
  }

  async render(source: string, name: string, params: QueryParams): Promise<string> {
    return renderQuery(stripComments(await this.load(source, name)), params);
  }
}

// `--` comments may mention placeholder names
export function stripComments(sql: string): string {
  return sql.split('\n').map(l => l.replace(/--.*$/, '')).join('\n');
}
