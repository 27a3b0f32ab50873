import { envNum } from './budgets.js';

export type OracleConfig = {
  host: string;
  port: number;
  serviceName: string;
  username: string;
  password: string;
};

export type RedshiftConfig = {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  schema: string;
  ssl: boolean;
};

export type RunDefaults = {
  timezone: string;
  bucketWidthHours: number;
  metric: string;
  outputDir: string;
  queryDir: string;
  midFormatCheck: boolean;
};

const str = (k: string, d = '') => (process.env[k] ?? d).trim();

export function readOracleConfig(): OracleConfig {
  return {
    host: str('ORACLE_HOST', '127.0.0.1'),
    port: envNum('ORACLE_PORT', 40112),
    serviceName: str('ORACLE_SERVICE_NAME'),
    username: str('ORACLE_USERNAME'),
    password: str('ORACLE_PASSWORD'),
  };
}

export function readRedshiftConfig(): RedshiftConfig {
  return {
    host: str('REDSHIFT_HOST'),
    port: envNum('REDSHIFT_PORT', 5439),
    database: str('REDSHIFT_DATABASE'),
    username: str('REDSHIFT_USERNAME'),
    password: str('REDSHIFT_PASSWORD'),
    schema: str('REDSHIFT_SCHEMA', 'public'),
    ssl: process.env.REDSHIFT_SSL === 'true',
  };
}

export function readRunDefaults(): RunDefaults {
  return {
    timezone: str('SOURCE_TIMEZONE', 'Asia/Seoul'),
    bucketWidthHours: envNum('BUCKET_WIDTH_HOURS', 4),
    metric: str('HEATMAP_METRIC', 'totalAmount'),
    outputDir: str('OUTPUT_DIR', 'output'),
    queryDir: str('QUERY_DIR', 'query'),
    midFormatCheck: process.env.MID_FORMAT_CHECK !== 'false',
  };
}

/** Names of required settings that are empty, e.g. `ORACLE_PASSWORD`. */
export function missingSourceSettings(oracle = readOracleConfig(), redshift = readRedshiftConfig()): string[] {
  const out: string[] = [];
  const need: Array<[string, string | number]> = [
    ['ORACLE_HOST', oracle.host],
    ['ORACLE_SERVICE_NAME', oracle.serviceName],
    ['ORACLE_USERNAME', oracle.username],
    ['ORACLE_PASSWORD', oracle.password],
    ['REDSHIFT_HOST', redshift.host],
    ['REDSHIFT_DATABASE', redshift.database],
    ['REDSHIFT_USERNAME', redshift.username],
    ['REDSHIFT_PASSWORD', redshift.password],
  ];
  for (const [k, v] of need) if (v === '') out.push(k);
  return out;
}
