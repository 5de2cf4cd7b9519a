import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

async function writeConfig(content: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "rfclink-config-"));
  const path = join(dir, "config.json");
  await writeFile(path, content, "utf-8");
  return path;
}

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.citations.host).toBe("datatracker");
    expect(config.server.port).toBe(5000);
    expect(config.templates.domain).toBeNull();
  });
});

describe("mergeConfig", () => {
  it("merges nested sections", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { citations: { host: "rfc-editor" } });
    expect(merged.citations).toEqual({ ...base.citations, host: "rfc-editor" });
    expect(merged.server).toEqual(base.server);
  });
});

describe("loadConfig", () => {
  it("applies a custom config file", async () => {
    const path = await writeConfig(JSON.stringify({ server: { port: 8080 } }));
    const { config, errors } = await loadConfig(path);

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe("127.0.0.1");
    expect(errors.filter((e) => e.path === path)).toEqual([]);
  });

  it("reports an invalid custom config and keeps the defaults", async () => {
    const path = await writeConfig(JSON.stringify({ citations: { host: "example" } }));
    const { config, errors } = await loadConfig(path);

    expect(errors.map((e) => e.path)).toContain(path);
    expect(config.citations.host).toBe("datatracker");
  });
});
