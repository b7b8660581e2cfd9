import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const webRoot = dirname(fileURLToPath(import.meta.url))
const projectRoot = resolve(webRoot, '..', '..')

// VITE_API_BASE_URL lives in the shared root .env next to the api settings.
export default defineConfig({
  envDir: projectRoot,
  plugins: [react()],
  server: {
    port: 5173
  },
  build: {
    outDir: 'dist',
    sourcemap: true
  }
})
