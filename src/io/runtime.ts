/**
 * Platform layer selection
 *
 * Provides the Effect platform services (FileSystem, Path, CommandExecutor)
 * used by every I/O helper and by the external tool layers.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the current runtime
 *
 * @returns Node.js platform layer
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
