import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createNodeFileSystem } from "./node";

describe("createNodeFileSystem", () => {
  let root: string;
  const fs = createNodeFileSystem();

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "compose-oci-loader-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("writes created files in call order", () => {
    const path = join(root, "compose.yaml");

    const file = fs.createFile(path);
    file.write("services: {}");
    file.write(Buffer.from("\n---\n"));
    file.write("name: demo\n");
    file.close();

    expect(readFileSync(path, "utf-8")).toBe("services: {}\n---\nname: demo\n");
    expect(fs.readFile(path)).toBe("services: {}\n---\nname: demo\n");
  });

  test("refuses to create a file that exists", () => {
    const path = join(root, "app.env");
    fs.createFile(path).close();

    expect(() => fs.createFile(path)).toThrow(/EEXIST/);
  });

  test("refuses writes after close", () => {
    const file = fs.createFile(join(root, "x"));
    file.close();

    expect(() => file.write("late")).toThrow("write after close");
  });

  test("creates directories with the requested mode", () => {
    const dir = join(root, "a", "b");

    fs.mkdir(dir, { recursive: true, mode: 0o700 });

    expect(fs.exists(dir)).toBe(true);
    if (process.platform !== "win32") {
      expect(statSync(dir).mode & 0o777).toBe(0o700);
    }
  });

  test("removes directories recursively", () => {
    const dir = join(root, "artifact");
    fs.mkdir(dir);
    fs.createFile(join(dir, "compose.yaml")).close();

    fs.rmdir(dir, { recursive: true });

    expect(fs.exists(dir)).toBe(false);
  });

  test("ignores removal of a missing directory", () => {
    expect(() => fs.rmdir(join(root, "missing"), { recursive: true })).not.toThrow();
  });
});
