/**
 * Node.js implementations of the core interfaces.
 */

import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  rmSync,
  writeSync,
} from "fs";
import type { FileSystem, HttpClient, WritableFile } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    exists(path: string): boolean {
      return existsSync(path);
    },

    mkdir(path: string, options?: { recursive?: boolean; mode?: number }): void {
      mkdirSync(path, options);
    },

    rmdir(path: string, options?: { recursive?: boolean }): void {
      rmSync(path, { recursive: options?.recursive ?? false, force: true });
    },

    createFile(path: string): WritableFile {
      // "wx": create, fail if the path exists
      const fd = openSync(path, "wx");
      let closed = false;

      return {
        path,
        write(content: Buffer | string): void {
          if (closed) {
            throw new Error(`write after close: ${path}`);
          }
          const data = typeof content === "string" ? Buffer.from(content) : content;
          let offset = 0;
          while (offset < data.length) {
            offset += writeSync(fd, data, offset, data.length - offset);
          }
        },
        close(): void {
          if (closed) return;
          closed = true;
          closeSync(fd);
        },
      };
    },
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch(url: string, options?: RequestInit): Promise<Response> {
      return fetch(url, options);
    },
  };
}
