/**
 * @streamplan/media
 * 
 * Media probing layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe
 * - Validate the probe document
 * - Normalise streams into a read-only inventory with per-type indexes
 */

// Probing
export { FFProbe, type CommandRunner } from './probes/ffprobe.js';

// Probe document
export {
  probeDocumentSchema,
  probeStreamSchema,
  type ProbeStream,
  type ProbeDocument,
} from './probeDocument.js';

// Inventory
export { createStreamInventory, streamsOfType } from './inventory.js';

// Types
export type { Stream, StreamTags, StreamInventory } from './types.js';
