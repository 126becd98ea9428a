import { describe, it, expect, beforeEach, vi } from "vitest";
import { DEFAULT_SETTINGS_CONFIG } from "../defaults";
import { computeSettingsFingerprint } from "../fingerprint";
import {
  importSettingsConfig,
  loadSettingsConfig,
  resetSettingsConfig,
  saveSettingsConfig,
  type SettingsStore,
} from "../store";

const storage: { value?: string } = {};
const store: SettingsStore = {
  read: vi.fn(async () => storage.value ?? null),
  write: vi.fn(async (payload: string) => {
    storage.value = payload;
  }),
  remove: vi.fn(async () => {
    delete storage.value;
  }),
};

beforeEach(() => {
  delete storage.value;
  vi.clearAllMocks();
});

describe("loadSettingsConfig", () => {
  it("returns defaults when nothing is stored", async () => {
    const { config, warning } = await loadSettingsConfig(store);
    expect(config).toEqual(DEFAULT_SETTINGS_CONFIG);
    expect(warning).toBeUndefined();
  });

  it("fills omitted fields with their defaults", async () => {
    storage.value = JSON.stringify({
      version: "1.0",
      contracts: [{ chainId: 1, type: "Treasury", addresses: ["0x0000000000000000000000000000000000000001"] }],
    });

    const { config, warning } = await loadSettingsConfig(store);
    expect(warning).toBeUndefined();
    expect(config).toEqual({
      version: "1.0",
      descriptorDirs: [],
      signatures: {},
      contracts: [{ chainId: 1, type: "Treasury", addresses: ["0x0000000000000000000000000000000000000001"] }],
      disabledVisualizers: [],
    });
  });

  it("returns defaults with parse_error warning for corrupt data", async () => {
    storage.value = "not json";

    const { config, warning } = await loadSettingsConfig(store);
    expect(config).toEqual(DEFAULT_SETTINGS_CONFIG);
    expect(warning?.kind).toBe("parse_error");
    expect(warning?.message).toContain("invalid JSON");
  });

  it("names the offending path on schema errors", async () => {
    storage.value = JSON.stringify({ version: "1.0", signatures: { transfer: ["transfer(address,uint256)"] } });

    const { config, warning } = await loadSettingsConfig(store);
    expect(config).toEqual(DEFAULT_SETTINGS_CONFIG);
    expect(warning?.kind).toBe("schema_error");
    expect(warning?.message).toBe(
      "Settings file failed schema validation: signatures.transfer: Expected a 4-byte 0x selector"
    );
  });

  it("rejects unknown versions", async () => {
    storage.value = JSON.stringify({ version: "2.0" });
    const { warning } = await loadSettingsConfig(store);
    expect(warning?.kind).toBe("schema_error");
  });

  it("returns the given fallback with read_error when the store throws", async () => {
    const failStore: SettingsStore = {
      read: vi.fn(async () => {
        throw new Error("disk failure");
      }),
      write: vi.fn(),
      remove: vi.fn(),
    };
    const fallback = { ...DEFAULT_SETTINGS_CONFIG, disabledVisualizers: ["erc20"] };

    const { config, warning } = await loadSettingsConfig(failStore, fallback);
    expect(config).toBe(fallback);
    expect(warning).toEqual({ kind: "read_error", message: "Failed to read settings: disk failure" });
  });
});

describe("saveSettingsConfig", () => {
  it("writes pretty-printed JSON that loads back", async () => {
    const custom = { ...DEFAULT_SETTINGS_CONFIG, descriptorDirs: ["./descriptors"] };
    await saveSettingsConfig(store, custom);

    expect(store.write).toHaveBeenCalledTimes(1);
    expect(storage.value?.endsWith("}\n")).toBe(true);
    expect((await loadSettingsConfig(store)).config).toEqual(custom);
  });
});

describe("resetSettingsConfig", () => {
  it("removes stored config and returns defaults", async () => {
    storage.value = JSON.stringify(DEFAULT_SETTINGS_CONFIG);

    const config = await resetSettingsConfig(store);
    expect(config).toEqual(DEFAULT_SETTINGS_CONFIG);
    expect(store.remove).toHaveBeenCalled();
    expect(storage.value).toBeUndefined();
  });
});

describe("importSettingsConfig", () => {
  it("imports a valid payload and saves it", async () => {
    const config = await importSettingsConfig(store, JSON.stringify({ version: "1.0", disabledVisualizers: ["raw-hex"] }));
    expect(config.disabledVisualizers).toEqual(["raw-hex"]);
    expect(store.write).toHaveBeenCalled();
  });

  it("throws on invalid payloads without writing", async () => {
    await expect(importSettingsConfig(store, "{")).rejects.toThrow(SyntaxError);
    await expect(importSettingsConfig(store, JSON.stringify({ version: "1.0", contracts: [{}] }))).rejects.toThrow(
      /^Invalid settings: contracts\.0\.chainId: Required/
    );
    expect(store.write).not.toHaveBeenCalled();
  });
});

describe("computeSettingsFingerprint", () => {
  it("ignores key order", () => {
    const a = { ...DEFAULT_SETTINGS_CONFIG, signatures: { "0xa9059cbb": ["transfer(address,uint256)"] } };
    const b = {
      disabledVisualizers: [],
      signatures: { "0xa9059cbb": ["transfer(address,uint256)"] },
      contracts: [],
      descriptorDirs: [],
      version: "1.0" as const,
    };
    expect(computeSettingsFingerprint(a)).toBe(computeSettingsFingerprint(b));
    expect(computeSettingsFingerprint(a)).not.toBe(computeSettingsFingerprint(DEFAULT_SETTINGS_CONFIG));
    expect(computeSettingsFingerprint(a)).toMatch(/^0x[0-9a-f]{64}$/);
  });
});
