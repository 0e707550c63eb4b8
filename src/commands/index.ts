/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { appendCommand } from './append.js';
export { anchorCommand } from './anchor.js';
export { logCommand } from './log.js';
export { verifyCommand } from './verify.js';
export { exportCommand } from './export.js';
export { importCommand } from './import.js';
export { statusCommand } from './status.js';
export { nodesCommand } from './nodes.js';
