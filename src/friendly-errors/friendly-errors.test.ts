import { describe, test, expect } from "vitest";
import { z } from "zod";
import { safeParseJson, safeParseYaml } from "./friendly-errors";

const Schema = z.object({
  name: z.string(),
  replicas: z.number().default(1),
});

describe("friendly-errors", () => {
  describe("safeParseYaml", () => {
    test("returns validated data", () => {
      const result = safeParseYaml("name: web\nreplicas: 3\n", Schema);

      expect(result).toEqual({ success: true, data: { name: "web", replicas: 3 } });
    });

    test("applies schema defaults", () => {
      const result = safeParseYaml("name: web\n", Schema);

      expect(result).toEqual({ success: true, data: { name: "web", replicas: 1 } });
    });

    test("reports YAML syntax errors with the file name", () => {
      const result = safeParseYaml("name: [web\n", Schema, "registries.yaml");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in registries.yaml");
        expect(result.error.details).toHaveLength(1);
      }
    });

    test("reports validation issues with their path", () => {
      const result = safeParseYaml("name: 3\n", Schema, "registries.yaml");

      expect(result).toEqual({
        success: false,
        error: {
          type: "validation",
          message: "Invalid configuration in registries.yaml",
          details: ["name: Expected string, received number"],
        },
      });
    });

    test("treats an empty document as an empty mapping", () => {
      const result = safeParseYaml("", z.object({ items: z.array(z.string()).default([]) }));

      expect(result).toEqual({ success: true, data: { items: [] } });
    });
  });

  describe("safeParseJson", () => {
    test("parses buffers", () => {
      const result = safeParseJson(Buffer.from('{"name":"web"}'), Schema);

      expect(result).toEqual({ success: true, data: { name: "web", replicas: 1 } });
    });

    test("reports JSON syntax errors", () => {
      const result = safeParseJson("{", Schema, "config.json");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("json");
        expect(result.error.message).toBe("Invalid JSON syntax in config.json");
      }
    });

    test("reports validation issues", () => {
      const result = safeParseJson("[]", Schema);

      expect(result).toEqual({
        success: false,
        error: {
          type: "validation",
          message: "Invalid configuration",
          details: ["Expected object, received array"],
        },
      });
    });
  });
});
