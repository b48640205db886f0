import { defineConfig } from 'vitest/config';

export default defineConfig({
    // Lit ships a server build under the "node" condition; components need the DOM build.
    // Shoelace is inlined so its Lit imports resolve the same way.
    resolve: {
        conditions: ['browser'],
    },
    test: {
        environment: 'jsdom',
        setupFiles: ['src/test-utils/setup-dom.ts'],
        include: ['src/**/*.test.ts'],
        server: {
            deps: {
                inline: [/^lit/, /^@lit\//, /^@shoelace-style\//],
            },
        },
    },
});
