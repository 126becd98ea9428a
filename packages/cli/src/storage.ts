import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import type { SettingsStore } from "@clearview/core";

const DEFAULT_DIR = path.join(os.homedir(), ".clearview");
const DEFAULT_FILE = path.join(DEFAULT_DIR, "settings.json");

export function resolveSettingsPath(customPath?: string): string {
  return customPath ? path.resolve(customPath) : DEFAULT_FILE;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createNodeSettingsStore(filePath?: string): SettingsStore {
  const resolved = resolveSettingsPath(filePath);

  return {
    async read() {
      try {
        return await fs.readFile(resolved, "utf-8");
      } catch (err) {
        if (isMissingFile(err)) return null;
        throw err;
      }
    },
    async write(payload: string) {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, payload, "utf-8");
    },
    async remove() {
      try {
        await fs.unlink(resolved);
      } catch (err) {
        if (isMissingFile(err)) return;
        throw err;
      }
    },
  };
}
