import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// base:'./' makes asset paths relative so the build can be served from any sub-path.
export default defineConfig({
  base: './',
  plugins: [react()],
  server: { port: 5173 }
})
