import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createNodeSettingsStore, resolveSettingsPath } from "./storage";

async function createTempDir() {
  return await fs.mkdtemp(path.join(os.tmpdir(), "clearview-cli-"));
}

describe("Node settings store", () => {
  it("reads, writes, and removes settings on disk", async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, "nested", "settings.json");
    const store = createNodeSettingsStore(filePath);

    try {
      expect(await store.read()).toBeNull();

      await store.write('{"ok":true}');
      expect(await store.read()).toBe('{"ok":true}');

      await store.remove();
      expect(await store.read()).toBeNull();
      await store.remove();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("defaults to the home directory", () => {
    expect(resolveSettingsPath()).toBe(path.join(os.homedir(), ".clearview", "settings.json"));
  });
});
