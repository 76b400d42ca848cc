import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// Dev: dashboard on 5173, API proxied to `npm run server` on 3000
export default defineConfig({
  plugins: [react()],
  clearScreen: false,
  server: {
    port: 5173,
    strictPort: true,
    proxy: {
      "/api": `http://localhost:${process.env.PORT || 3000}`,
    },
  },
  build: {
    target: "es2022",
    outDir: "dist",
    sourcemap: false,
  },
});
