import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  server: {
    // The simulator engine lives in ../core
    fs: { allow: ['..'] },
  },
  build: {
    outDir: '../dist/web',
    emptyOutDir: true,
    rollupOptions: {
      output: {
        manualChunks: {
          // Split Monaco editor into its own chunk (~2.5MB)
          monaco: ['monaco-editor', '@monaco-editor/react'],
          react: ['react', 'react-dom'],
        },
      },
    },
  },
})
