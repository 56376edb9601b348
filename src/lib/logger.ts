import { createConsola } from 'consola/browser';

const isTest = Boolean(globalThis.process?.env.VITEST);

export const logger = createConsola({
    // -999 is consola's silent level
    level: isTest ? -999 : 4,
});
