/**
 * Processor Implementations
 *
 * Organized by category:
 * - basic/  - Identity
 * - cipher/ - Keyed transforms holding secret material
 * - codec/  - Text encodings
 */

export { passthroughProcessor } from './basic/passthrough.js';
export { XorProcessor } from './cipher/xor.js';
export { Base64Processor } from './codec/base64.js';
