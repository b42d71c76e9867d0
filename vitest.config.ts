import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const lib = (name: string) => fileURLToPath(new URL(`./libs/${name}/src/index.ts`, import.meta.url));

const alias = {
  '@libs/hostlist': lib('hostlist'),
  '@libs/dispatch-http-core': lib('dispatch-http-core'),
  '@libs/backend-dispatcher': lib('backend-dispatcher'),
  '@libs/ochami-client': lib('ochami-client'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
