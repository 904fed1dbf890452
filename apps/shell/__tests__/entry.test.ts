import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const ManifestSchema = z.object({
  bin: z.unknown().optional(),
  scripts: z.record(z.string()),
  devDependencies: z.record(z.string()),
});

const rootFile = (path: string): string => fileURLToPath(new URL(`../../../${path}`, import.meta.url));

describe("shell entry point", () => {
  const manifest = ManifestSchema.parse(JSON.parse(readFileSync(rootFile("package.json"), "utf-8")));

  it("starts from the TypeScript source through tsx", () => {
    expect(manifest.scripts.start).toBe("tsx apps/shell/src/bin.ts");
    expect(manifest.devDependencies).toHaveProperty("tsx");
  });

  it("declares no binary pointing at compiled output", () => {
    expect(manifest.bin).toBeUndefined();
  });

  it("bin.ts runs under tsx when executed directly", () => {
    const firstLine = readFileSync(rootFile("apps/shell/src/bin.ts"), "utf-8").split("\n")[0];
    expect(firstLine).toBe("#!/usr/bin/env npx tsx");
  });
});
