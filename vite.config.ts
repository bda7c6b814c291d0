import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';
import autoprefixer from 'autoprefixer';
import tailwindcss from 'tailwindcss';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, '.', '');
  return {
    server: {
      port: 3000,
      proxy: {
        '/api': {
          target: env.PROXY_TARGET || 'http://127.0.0.1:5000',
          changeOrigin: true,
        },
      },
    },
    css: {
      postcss: {
        plugins: [
          tailwindcss({ content: ['./index.html', './src/**/*.{ts,tsx}'] }),
          autoprefixer(),
        ],
      },
    },
    plugins: [react()],
  };
});
