import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: false,
    sourcemap: true,
    clean: true,
    minify: false,
    splitting: false,
    noExternal: [/^@managed-inspector\//],
    banner: { js: "#!/usr/bin/env node" },
});
