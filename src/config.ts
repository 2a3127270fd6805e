import path from 'node:path';
import { parseAuthString, type Credentials } from './auth.js';
import { ConfigError } from './errors.js';

export const APP_NAME = 'lanshare';
export const APP_VERSION = '1.0.0';

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '0.0.0.0';

export interface CliOptions {
  root?: string;
  port?: string;
  host?: string;
  auth?: string;
  ssl?: boolean;
  auditDir?: string;
  quiet?: boolean;
  help?: boolean;
  version?: boolean;
}

export interface ServerConfig {
  root: string;
  host: string;
  port: number;
  credentials: Credentials | null;
  tls: boolean;
  auditDir: string | null;
  logRequests: boolean;
}

export type Env = Record<string, string | undefined>;

export const USAGE = `Usage: ${APP_NAME} [dir] [options]

Options:
  -p, --port <port>       port to bind to (default ${DEFAULT_PORT})
  -H, --host <addr>       interface to bind to (default ${DEFAULT_HOST})
  -a, --auth <user:pass>  require HTTP Basic authentication
      --ssl               serve HTTPS with a throwaway self-signed certificate
      --audit-dir <dir>   append JSON-lines audit records to <dir>
      --quiet             do not log every request
  -v, --version           print the version
  -h, --help              print this help`;

const VALUE_FLAGS: Record<string, 'port' | 'host' | 'auth' | 'auditDir'> = {
  '--port': 'port',
  '-p': 'port',
  '--host': 'host',
  '-H': 'host',
  '--auth': 'auth',
  '-a': 'auth',
  '--audit-dir': 'auditDir'
};

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    const key = VALUE_FLAGS[flag];
    if (key) {
      if (eq > 0) {
        options[key] = arg.slice(eq + 1);
        continue;
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new ConfigError(`missing value for ${flag}`);
      }
      options[key] = next;
      i += 1;
      continue;
    }

    if (arg === '--ssl') {
      options.ssl = true;
    } else if (arg === '--quiet') {
      options.quiet = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`unknown option ${arg}`);
    } else if (options.root === undefined) {
      options.root = arg;
    } else {
      throw new ConfigError(`unexpected argument ${arg}`);
    }
  }
  return options;
}

function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return !/^(0|false|off|no)$/i.test(raw.trim());
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`invalid port ${raw}, expected 1-65535`);
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Flags win over LANSHARE_* environment variables. */
export function resolveConfig(options: CliOptions, env: Env = process.env): ServerConfig {
  const rawRoot = nonEmpty(options.root) ?? nonEmpty(env.LANSHARE_ROOT) ?? '.';
  const rawPort = nonEmpty(options.port) ?? nonEmpty(env.LANSHARE_PORT);
  const rawAuth = options.auth ?? nonEmpty(env.LANSHARE_AUTH);
  const auditDir = nonEmpty(options.auditDir) ?? nonEmpty(env.LANSHARE_AUDIT_DIR);

  return {
    root: path.resolve(rawRoot),
    host: nonEmpty(options.host) ?? nonEmpty(env.LANSHARE_HOST) ?? DEFAULT_HOST,
    port: rawPort === undefined ? DEFAULT_PORT : parsePort(rawPort),
    credentials: rawAuth === undefined ? null : parseAuthString(rawAuth),
    tls: options.ssl ?? parseBooleanEnv(env.LANSHARE_SSL, false),
    auditDir: auditDir === undefined ? null : path.resolve(auditDir),
    logRequests: options.quiet ? false : parseBooleanEnv(env.LANSHARE_LOG_REQUESTS, true)
  };
}
