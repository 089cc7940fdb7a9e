import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Integrations off and logs quiet regardless of a local .env
    env: {
      LOG_LEVEL: 'error',
      DRAFTS_ROOT: '',
      TEMPLATE_PATH: '',
      EXPORT_COMMAND: '',
      INBOX_DIR: '',
      SUPABASE_URL: '',
      SUPABASE_SERVICE_KEY: '',
      TELEGRAM_BOT_TOKEN: '',
      TELEGRAM_CHAT_ID: '',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/**/*.test.ts', 'src/testing/**'],
    },
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
