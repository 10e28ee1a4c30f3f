/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { dirname } from "path";
import type {
  FileSystem,
  HttpClient,
  Logger,
  RegistryCredentials,
  TokenProvider,
  WritableFile,
} from "#/core";
import { createLogger, type LogEntry } from "#/core";
import { ResolutionError } from "#/errors";
import { computeDigest } from "#/oci";
import type { OciManifest } from "#/oci";
import type { ResolvedContent, Resolver } from "#/registry";

interface MockFileEntry {
  content: Buffer;
  isDirectory: boolean;
  mode?: number;
}

export type MockFileSystem = FileSystem & {
  files: Map<string, MockFileEntry>;
  /** Paths of files created but not closed yet */
  openFiles: Set<string>;
  /** Errors thrown when creating or writing the given path */
  failures: Map<string, Error>;
  /** Paths passed to rmdir, in call order */
  removed: string[];
  /** Number of mkdir calls per path */
  mkdirCalls: Map<string, number>;
  /** Content of a file as UTF-8 */
  text(path: string): string | undefined;
};

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(initialFiles: Record<string, string> = {}): MockFileSystem {
  const files = new Map<string, MockFileEntry>();
  const openFiles = new Set<string>();
  const failures = new Map<string, Error>();
  const removed: string[] = [];
  const mkdirCalls = new Map<string, number>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content: Buffer.from(content), isDirectory: false });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = path.endsWith("/") ? path : `${path}/`;
    for (const key of files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  };

  const exists = (path: string): boolean => files.has(path) || hasChildren(path);

  return {
    files,
    openFiles,
    failures,
    removed,
    mkdirCalls,

    text(path: string): string | undefined {
      const entry = files.get(path);
      return entry && !entry.isDirectory ? entry.content.toString("utf-8") : undefined;
    },

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return entry.content.toString("utf-8");
    },

    exists,

    mkdir(path: string, options?: { recursive?: boolean; mode?: number }): void {
      mkdirCalls.set(path, (mkdirCalls.get(path) ?? 0) + 1);
      const failure = failures.get(path);
      if (failure) {
        throw failure;
      }
      const entry = files.get(path);
      if (entry && !entry.isDirectory) {
        throw new Error(`EEXIST: file already exists, mkdir '${path}'`);
      }
      if (!entry) {
        files.set(path, { content: Buffer.alloc(0), isDirectory: true, mode: options?.mode });
      }
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      removed.push(path);
      const normalizedPath = path.endsWith("/") ? path.slice(0, -1) : path;
      for (const filePath of [...files.keys()]) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },

    createFile(path: string): WritableFile {
      const failure = failures.get(path);
      if (failure) {
        throw failure;
      }
      if (files.has(path)) {
        throw new Error(`EEXIST: file already exists, open '${path}'`);
      }
      if (!exists(dirname(path))) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }

      const entry: MockFileEntry = { content: Buffer.alloc(0), isDirectory: false };
      files.set(path, entry);
      openFiles.add(path);

      return {
        path,
        write(content: Buffer | string): void {
          if (!openFiles.has(path)) {
            throw new Error(`write after close: ${path}`);
          }
          const data = typeof content === "string" ? Buffer.from(content) : content;
          entry.content = Buffer.concat([entry.content, data]);
        },
        close(): void {
          openFiles.delete(path);
        },
      };
    },
  };
}

/**
 * Create a mock HttpClient with predefined responses
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & {
  responses: Map<string, Response | (() => Response)>;
  requests: { url: string; options?: RequestInit }[];
} {
  const requests: { url: string; options?: RequestInit }[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      requests.push({ url, options });
      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Content and descriptor for a blob, digest computed from the content
 */
export function blob(content: string | Buffer, mediaType = "application/octet-stream"): ResolvedContent {
  const data = typeof content === "string" ? Buffer.from(content) : content;
  return {
    content: data,
    descriptor: { mediaType, digest: computeDigest(data), size: data.length },
  };
}

/**
 * Serialized manifest with its descriptor
 */
export function manifestContent(manifest: OciManifest): ResolvedContent {
  return blob(JSON.stringify(manifest), "application/vnd.oci.image.manifest.v1+json");
}

/**
 * Create a mock Resolver serving fixed content per reference string.
 * Unknown references fail like a registry 404.
 */
export function createMockResolver(
  entries: Record<string, ResolvedContent | Error> = {}
): Resolver & { entries: Record<string, ResolvedContent | Error>; calls: string[] } {
  const calls: string[] = [];

  return {
    entries,
    calls,

    async get(reference: string): Promise<ResolvedContent> {
      calls.push(reference);
      const entry = entries[reference];
      if (entry === undefined) {
        throw new ResolutionError(reference, `${reference}: not found`, 404);
      }
      if (entry instanceof Error) {
        throw entry;
      }
      return entry;
    },
  };
}

/**
 * Create a mock TokenProvider
 */
export function createMockTokenProvider(
  credentials: Record<string, RegistryCredentials> = {}
): TokenProvider {
  return {
    getRegistryCredentials(host: string): RegistryCredentials | undefined {
      return credentials[host];
    },
  };
}

/**
 * Logger keeping every entry (debug and up) in memory
 */
export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: "debug", handler: (entry) => entries.push(entry) });
  return Object.assign(logger, { entries });
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(
  status: number,
  statusText: string,
  headers: Record<string, string> = {}
): Response {
  return new Response(null, { status, statusText, headers });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(
  data: Buffer | string,
  headers: Record<string, string> = {},
  status = 200
): Response {
  return new Response(typeof data === "string" ? data : new Uint8Array(data), {
    status,
    headers: { "Content-Type": "application/octet-stream", ...headers },
  });
}
