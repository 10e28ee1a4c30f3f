/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

/**
 * A file opened for writing. Writes go to the end of the file in call order.
 * Callers own the handle and must close it on every exit path.
 */
export interface WritableFile {
  readonly path: string;
  write(content: Buffer | string): void;
  close(): void;
}

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean; mode?: number }): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
  /**
   * Create a new file and open it for writing.
   * Fails if the file already exists.
   */
  createFile(path: string): WritableFile;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Credentials for a single registry host, as found in the user's
 * registry credentials file.
 */
export interface RegistryCredentials {
  username?: string;
  password?: string;
  /** OAuth2 refresh token exchanged at the token endpoint */
  identityToken?: string;
  /** Bearer token sent as-is */
  registryToken?: string;
}

export interface TokenProvider {
  getRegistryCredentials(host: string): RegistryCredentials | undefined;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Environment variable lookup (process.env in production)
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;
