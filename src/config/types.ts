export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogMetadata = Record<string, unknown>;

export interface RequestLimits {
  readonly maxRequestLineBytes: number;
  readonly maxHeaderBytes: number;
  readonly maxHeaderCount: number;
  readonly maxBodyBytes: number;
}

export interface ConnectionTimeouts {
  /** Bound on waiting for the first byte of a request. */
  readonly idleTimeoutMs: number;
  /** Bound on assembling one complete request once any byte of it arrived. */
  readonly headersTimeoutMs: number;
  /** Bound on draining the peer after a graceful close before destroying. */
  readonly closeLingerMs: number;
}

export interface ConnectionOptions extends RequestLimits, ConnectionTimeouts {
  /** 0 disables the cap. */
  readonly maxRequestsPerConnection: number;
}

export interface ServerSettings {
  readonly name: string;
  readonly version: string;
  readonly host: string;
  readonly port: number;
  readonly maxConnections: number;
}

export interface LoggingSettings {
  readonly enabled: boolean;
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface AppConfig {
  readonly server: ServerSettings;
  readonly connection: ConnectionOptions;
  readonly logging: LoggingSettings;
}
