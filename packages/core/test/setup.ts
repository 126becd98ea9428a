import { afterEach } from "vitest";
import { resetBundledFormatTable } from "../src/lib/descriptors/bundled";
import { resetDefaultRuntime } from "../src/lib/runtime";

afterEach(() => {
  resetBundledFormatTable();
  resetDefaultRuntime();
});
