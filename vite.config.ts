import { defineConfig } from 'vite';
import preact from '@preact/preset-vite';

export default defineConfig({
  plugins: [preact()],

  root: '.',

  build: {
    outDir: 'dist/client',
    emptyOutDir: true,
  },

  server: {
    port: 5173,
    // Proxy API requests to Express server
    proxy: {
      '/api': {
        target: 'http://localhost:3000',
        changeOrigin: true,
      },
    },
  },
});
