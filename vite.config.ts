import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// Frontend dev server proxies API calls to the extraction service.
export default defineConfig({
  root: 'invoice-extractor-frontend',
  plugins: [react()],
  server: {
    port: 5173,
    proxy: {
      '/api': 'http://localhost:3000',
    },
  },
  build: {
    outDir: 'dist',
    emptyOutDir: true,
  },
});
