import path from 'node:path';
import { fileURLToPath } from 'node:url';
import react from '@vitejs/plugin-react';
import { defineConfig } from 'vite';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const API_TARGET = process.env.SHELFWISE_API ?? 'http://127.0.0.1:17610';
const API_PREFIXES = ['/health', '/books', '/sessions', '/stats', '/goals', '/settings'];

export default defineConfig({
  root: path.resolve(__dirname, 'src/renderer'),
  base: './',
  plugins: [react()],
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, './src/shared')
    }
  },
  build: {
    outDir: path.resolve(__dirname, 'dist/renderer'),
    emptyOutDir: true,
    sourcemap: true,
    target: 'es2021'
  },
  server: {
    host: '127.0.0.1',
    port: 5173,
    strictPort: true,
    // The dev server forwards API calls and the event socket to the local backend.
    proxy: {
      ...Object.fromEntries(API_PREFIXES.map((prefix) => [prefix, API_TARGET])),
      '/events': { target: API_TARGET, ws: true }
    }
  }
});
