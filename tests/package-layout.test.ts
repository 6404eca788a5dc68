import { existsSync, readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { z } from "zod";

const ROOT = new URL("../", import.meta.url);

function readJson<T>(path: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(path, ROOT), "utf-8"));
  return schema.parse(raw);
}

const emitOptions = z.object({ compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }) });

/** Where tsc writes `source` for a project with these options. */
function emittedPath(source: string, options: { rootDir: string; outDir: string }): string {
  return source.replace(`${options.rootDir}/`, `${options.outDir}/`).replace(/\.ts$/, ".js");
}

describe("build layout", () => {
  it("points the CLI at the compiled entry point and emits sources only", () => {
    const manifest = readJson("package.json", z.object({ bin: z.record(z.string()) }));
    const build = readJson("tsconfig.build.json", emitOptions.extend({ include: z.array(z.string()) }));

    expect(build.include).toEqual(["src/**/*.ts"]);
    expect(emittedPath("src/kernel.ts", build.compilerOptions)).toBe(manifest.bin.sidescreen);
    expect(existsSync(new URL("src/kernel.ts", ROOT))).toBe(true);
  });

  it("resolves the shared package to its build output at run time", () => {
    const shared = readJson(
      "packages/shared/package.json",
      z.object({ exports: z.object({ ".": z.object({ types: z.string(), default: z.string() }) }) })
    );
    const config = readJson("packages/shared/tsconfig.json", emitOptions);
    const entry = shared.exports["."];

    expect(entry.types).toBe("./src/index.ts");
    expect(entry.default).toBe(`./${emittedPath("src/index.ts", config.compilerOptions)}`);
  });
});
