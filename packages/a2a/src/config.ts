/**
 * A2A Server Configuration
 */

// ========== Config ==========

export interface ServerConfig {
  /** Name used in logs and /health */
  name?: string;
  port?: number;
  host?: string;
  /** URL advertised to clients; derived from host and port when omitted */
  publicUrl?: string;
  /** Mount path of the JSON-RPC endpoint */
  rpcPath?: string;
}

// ========== Defaults ==========

export const DEFAULT_SERVER = {
  name: 'Storyteller',
  port: 8080,
  host: '0.0.0.0',
  rpcPath: '/a2a',
} as const;

// ========== Resolved ==========

export interface ResolvedServerConfig {
  name: string;
  port: number;
  host: string;
  publicUrl: string;
  rpcPath: string;
}

export function resolveServerConfig(config: ServerConfig = {}): ResolvedServerConfig {
  const port = config.port ?? DEFAULT_SERVER.port;
  const host = config.host ?? DEFAULT_SERVER.host;
  const rpcPath = normalizePath(config.rpcPath ?? DEFAULT_SERVER.rpcPath);
  const advertisedHost = host === '0.0.0.0' ? 'localhost' : host;

  return {
    name: config.name ?? DEFAULT_SERVER.name,
    port,
    host,
    publicUrl: (config.publicUrl ?? `http://${advertisedHost}:${port}`).replace(/\/$/, ''),
    rpcPath,
  };
}

function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}
