import { defineConfig } from "vite";

export default defineConfig({
    root: "example",
    base: "./",
    build: {
        outDir: "../docs/demo",
        assetsDir: "assets",
        emptyOutDir: true
    },
});
