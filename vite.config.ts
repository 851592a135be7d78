// vite.config.ts
import { defineConfig } from 'vite';

export default defineConfig({
  // Relative asset paths so the build runs from any subdirectory
  base: './',
  build: {
    outDir: 'dist',
  },
  server: {
    open: true,
    headers: {
      'Content-Security-Policy': "default-src 'self'; style-src 'self' 'unsafe-inline'; script-src 'self';",
    },
  },
});
