import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';
import { createLibConfig } from '../../scripts/vite-lib.config';

export default defineConfig(
  createLibConfig({
    name: 'MemtreeCore',
    fileName: 'memtree-core',
    external: ['immer'],
    rootDir: fileURLToPath(new URL('.', import.meta.url)),
  })
);
