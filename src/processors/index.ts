/**
 * Processors Module
 *
 * The byte-processing chain: processor contract, built-in processors,
 * the registry that orders them, and the size guard applied around it.
 *
 * Usage:
 *
 *    ```ts
 *    import { ModuleRegistry, assertWithinLimit } from './processors/index.js';
 *
 *    const registry = new ModuleRegistry(config);
 *    try {
 *      assertWithinLimit(input, limit);
 *      const output = registry.processAll(input);
 *      assertWithinLimit(output, limit);
 *    } finally {
 *      registry.dispose();
 *    }
 *    ```
 */

// Export types
export * from './types.js';

// Export registry
export { ModuleRegistry } from './registry.js';

// Export size guard
export { assertWithinLimit, maxStreamSizeBytes, KB } from './size-guard.js';

// Export implementations
export * from './impl/index.js';
