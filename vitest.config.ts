import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      VACATION_PLANNER_CONF_PATH: '/tmp/vacation-planner-test/conf',
      VACATION_PLANNER_OUTPUT_PATH: '/tmp/vacation-planner-test/out',
    },
  },
});
