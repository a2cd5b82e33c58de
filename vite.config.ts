import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// relative base so the build can be served from any sub-path
export default defineConfig({
  plugins: [react()],
  base: './',
  build: { outDir: 'dist/web' },
})
