export type { ElementFixture, Matchers, TestFramework } from './types';
export * from './fixtures';
export { vitestFramework } from './vitest';
export { generateDataBufferTests } from './generators/data-buffer-operations';
export { generateNdArrayTests } from './generators/ndarray-operations';
