import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — the codec uses only TextEncoder, TextDecoder and
  // DataView, which Node.js and browsers both provide.
  platform: "neutral",
});
