/**
 * Command line and environment configuration.
 *
 * Environment variables seed the values; flags override them. The merged
 * record is validated by `ConfigSchema`.
 */

import { z } from 'zod';

import { ConfigError } from '../../_shared/ts/errors';
import { LOG_LEVELS } from '../../_shared/ts/logger';
import { formatZodIssues } from '../../_shared/ts/validation';

// ─── Schema ─────────────────────────────────────────────────────────────────

export const DEFAULT_LISTEN_ADDR = '0.0.0.0:38085';

export interface ListenAddress {
  host: string;
  port: number;
}

/** Split `host:port`; an empty host means all interfaces, `[::1]:80` is unbracketed. */
export function parseListenAddress(value: string): ListenAddress | undefined {
  const colon = value.lastIndexOf(':');
  if (colon === -1) return undefined;

  let host = value.slice(0, colon);
  const portText = value.slice(colon + 1);
  if (!/^\d{1,5}$/.test(portText)) return undefined;

  const port = Number(portText);
  if (port > 65535) return undefined;

  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1);
  return { host: host.length > 0 ? host : '0.0.0.0', port };
}

const DEFAULT_LISTEN: ListenAddress = { host: '0.0.0.0', port: 38085 };

/** `listen` is only read in SSE mode; stdio mode ignores it. */
export const ConfigSchema = z
  .object({
    mode: z.enum(['stdio', 'sse']).default('stdio'),
    listen: z.string().optional(),
    logLevel: z.enum(LOG_LEVELS).default('INFO'),
    allowedDirectories: z.array(z.string().min(1)).min(1, 'no allowed directories specified'),
  })
  .transform(({ listen, ...rest }, ctx) => {
    if (rest.mode !== 'sse' || listen === undefined) {
      return { ...rest, listen: { ...DEFAULT_LISTEN } };
    }
    const parsed = parseListenAddress(listen);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['listen'],
        message: `invalid listen address "${listen}", expected host:port`,
      });
      return z.NEVER;
    }
    return { ...rest, listen: parsed };
  });

export type ServerConfig = z.infer<typeof ConfigSchema>;

export type CommandLine = { kind: 'help' } | { kind: 'run'; config: ServerConfig };

// ─── Parsing ────────────────────────────────────────────────────────────────

interface RawConfig {
  mode?: string;
  listen?: string;
  logLevel?: string;
  allowedDirectories: string[];
}

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    mode: env.MCP_SERVER_MODE?.toLowerCase() || undefined,
    listen: env.MCP_LISTEN_ADDR || undefined,
    logLevel: env.LOG_LEVEL?.toUpperCase() || undefined,
    allowedDirectories: [],
  };
}

function splitFlag(arg: string): { name: string; value: string | undefined } {
  const eq = arg.indexOf('=');
  return eq === -1 ? { name: arg, value: undefined } : { name: arg.slice(0, eq), value: arg.slice(eq + 1) };
}

function requireValue(name: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) {
    throw new ConfigError(`option ${name} requires a value (${name}=<value>)`);
  }
  return value;
}

/**
 * Parse `argv` (without the node and script entries) over `env`.
 * Throws `ConfigError` for unknown options and invalid values.
 */
export function parseCommandLine(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CommandLine {
  const raw = fromEnv(env);
  let optionsDone = false;

  for (const arg of argv) {
    if (optionsDone || !arg.startsWith('-') || arg === '-') {
      raw.allowedDirectories.push(arg);
      continue;
    }
    if (arg === '--') {
      optionsDone = true;
      continue;
    }

    const { name, value } = splitFlag(arg);
    switch (name) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--mode':
        raw.mode = requireValue(name, value).toLowerCase();
        break;
      case '--listen':
        raw.listen = requireValue(name, value);
        break;
      case '--log-level':
        raw.logLevel = requireValue(name, value).toUpperCase();
        break;
      default:
        throw new ConfigError(`unknown option: ${name}`);
    }
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error));
  }
  return { kind: 'run', config: result.data };
}

// ─── Usage ──────────────────────────────────────────────────────────────────

export function usage(version: string): string {
  return [
    `fs-sandbox-mcp v${version}`,
    '',
    'Usage: fs-sandbox-mcp [options] <allowed-directory> [additional-directories...]',
    '',
    'Options:',
    '  --help, -h           Show this help message',
    "  --mode=<mode>        Transport: 'stdio' (default) or 'sse'",
    `  --listen=<address>   HTTP listen address for SSE mode (default: ${DEFAULT_LISTEN_ADDR})`,
    '  --log-level=<level>  DEBUG, INFO, WARN, ERROR or FATAL (default: INFO)',
    '',
    'Environment variables (overridden by the matching option):',
    '  MCP_SERVER_MODE      Transport',
    '  MCP_LISTEN_ADDR      HTTP listen address',
    '  LOG_LEVEL            Log level',
    '',
    'Operations are only allowed inside the given directories.',
    '',
    'Examples:',
    '  fs-sandbox-mcp /srv/projects /home/me/notes',
    '  fs-sandbox-mcp --mode=sse --listen=127.0.0.1:38085 --log-level=DEBUG /srv/projects',
    '',
  ].join('\n');
}
